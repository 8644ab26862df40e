import path from 'node:path';
import os from 'node:os';
import crypto from 'node:crypto';
import fs from 'fs-extra';

/**
 * Configuration for creating a test fixture
 */
export interface FixtureConfig {
  /** Name of the fixture directory */
  name: string;
  /** Files to create, keyed by path relative to the fixture root */
  files?: Record<string, string>;
  /** Directories to create (empty dirs) */
  directories?: string[];
}

/**
 * Track created fixtures for cleanup
 */
const createdFixtures: string[] = [];

/**
 * Create a temporary fixture directory with specified configuration
 */
export async function createTempFixture(config: FixtureConfig): Promise<string> {
  const uniqueId = crypto.randomBytes(8).toString('hex');
  const fixturePath = path.join(os.tmpdir(), `test-fixture-${config.name}-${uniqueId}`);

  await fs.ensureDir(fixturePath);
  createdFixtures.push(fixturePath);

  if (config.files) {
    for (const [relativePath, content] of Object.entries(config.files)) {
      const filePath = path.join(fixturePath, relativePath);
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeFile(filePath, content, 'utf-8');
    }
  }

  if (config.directories) {
    for (const dir of config.directories) {
      await fs.ensureDir(path.join(fixturePath, dir));
    }
  }

  return fixturePath;
}

/**
 * Clean up all created temporary fixtures
 */
export async function cleanupFixtures(): Promise<void> {
  for (const fixturePath of createdFixtures) {
    try {
      await fs.remove(fixturePath);
    } catch {
      // Ignore cleanup errors
    }
  }
  createdFixtures.length = 0;
}

/**
 * Read a file from a fixture
 */
export async function readFixtureFile(fixturePath: string, relativePath: string): Promise<string> {
  return fs.readFile(path.join(fixturePath, relativePath), 'utf-8');
}

/**
 * Pre-built fixture configurations for common project layouts
 */
export const fixtureConfigs = {
  /** Poetry project with black, isort and mypy configured in pyproject.toml */
  poetry: (): FixtureConfig => ({
    name: 'poetry',
    files: {
      'pyproject.toml': [
        '[tool.poetry]',
        'name = "demo-app"',
        'version = "1.2.0"',
        'description = "Demo application"',
        'authors = ["Jane Doe <jane@example.com>"]',
        '',
        '[tool.poetry.dependencies]',
        'python = "^3.11"',
        'requests = "^2.31"',
        '',
        '[tool.poetry.group.dev.dependencies]',
        'pytest = "^8.0"',
        '',
        '[tool.black]',
        'line-length = 100',
        '',
        '[tool.isort]',
        'profile = "black"',
        '',
        '[tool.mypy]',
        'strict = true',
        '',
      ].join('\n'),
      'poetry.lock': '# lock\n',
    },
  }),

  /** pip project with requirements files and flake8 */
  pip: (): FixtureConfig => ({
    name: 'pip',
    files: {
      'requirements.txt': 'requests>=2.31\nclick==8.1.7\n',
      'requirements-dev.txt': '-r requirements.txt\npytest>=8\n',
      '.flake8': '[flake8]\nmax-line-length = 120\nextend-ignore = E203\n',
    },
  }),

  /** Project already on uv, ruff, basedpyright and pre-commit */
  modern: (): FixtureConfig => ({
    name: 'modern',
    files: {
      'pyproject.toml': [
        '[project]',
        'name = "modern-app"',
        'version = "0.1.0"',
        '',
        '[tool.uv]',
        'dev-dependencies = []',
        '',
        '[tool.ruff]',
        'line-length = 88',
        '',
        '[tool.basedpyright]',
        'typeCheckingMode = "standard"',
        '',
      ].join('\n'),
      'uv.lock': 'version = 1\n',
      '.pre-commit-config.yaml': 'repos: []\n',
    },
  }),
};
