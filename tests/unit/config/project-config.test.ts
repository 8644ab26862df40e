import { describe, it, expect, afterEach } from 'vitest';
import path from 'node:path';
import {
  enabledFeatures,
  loadProjectConfig,
  packageName,
  parseProjectConfig,
  projectDir,
  ProjectConfigSchema,
  requiresPython,
  srcPath,
  testPath,
} from '../../../src/config/project-config.js';
import { ActionableError } from '../../../src/utils/errors.js';
import { createTempFixture, cleanupFixtures, fixtureConfigs } from '../../helpers/fixtures.js';

describe('ProjectConfig', () => {
  describe('parseProjectConfig', () => {
    it('should fill defaults', () => {
      const config = parseProjectConfig({ name: 'demo', outputDir: '/work' });

      expect(config).toEqual({
        name: 'demo',
        description: 'A Python project',
        projectType: 'library',
        pythonVersion: '3.12',
        license: 'MIT',
        author: { name: 'Your Name' },
        tooling: { linter: 'ruff', formatter: 'ruff', typeChecker: 'basedpyright', typeCheckingMode: 'standard' },
        features: {
          githubActions: true,
          docker: false,
          devcontainer: false,
          docs: false,
          preCommit: true,
          vscode: true,
        },
        outputDir: '/work',
      });
    });

    it('should default the output directory to the working directory', () => {
      expect(parseProjectConfig({ name: 'demo' }).outputDir).toBe(process.cwd());
    });

    it('should trim and lower-case the name', () => {
      expect(parseProjectConfig({ name: '  My-App ' }).name).toBe('my-app');
    });

    it.each([['class'], ['None'], ['TRUE'], ['async']])('should reject the reserved word %s', (name) => {
      expect(() => parseProjectConfig({ name })).toThrow(
        `name: '${name.toLowerCase()}' is a Python reserved word and cannot be used as a project name`
      );
    });

    it.each([[''], ['1app'], ['my app'], ['a'.repeat(101)]])('should reject the name %j', (name) => {
      expect(() => parseProjectConfig({ name })).toThrow(ActionableError);
    });

    it('should reject Docker and docs for scripts', () => {
      expect(() =>
        parseProjectConfig({ name: 'tool', projectType: 'script', features: { docker: true, docs: true } })
      ).toThrow(
        'Invalid project configuration:\n' +
          'features.docker: Docker is not applicable for single-file scripts\n' +
          'features.docs: Documentation setup is not applicable for single-file scripts'
      );
    });

    it('should accept a script with the default features', () => {
      expect(parseProjectConfig({ name: 'tool', projectType: 'script' }).projectType).toBe('script');
    });

    it('should reject unknown keys and invalid emails', () => {
      expect(ProjectConfigSchema.safeParse({ name: 'demo', extra: true }).success).toBe(false);
      expect(() => parseProjectConfig({ name: 'demo', author: { name: 'A', email: 'not-an-email' } })).toThrow(
        'author.email: Invalid email format'
      );
    });

    it('should carry a hint', () => {
      try {
        parseProjectConfig({ name: 'for' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ActionableError);
        expect(error).toHaveProperty('hint', 'Fix the listed fields and try again');
      }
    });
  });

  describe('derived paths', () => {
    it('should use a src layout for libraries', () => {
      const config = parseProjectConfig({ name: 'my-lib', outputDir: '/work' });

      expect(packageName(config)).toBe('my_lib');
      expect(srcPath(config)).toBe(path.join('src', 'my_lib'));
      expect(projectDir(config)).toBe(path.join('/work', 'my-lib'));
      expect(testPath()).toBe('tests');
      expect(requiresPython(config)).toBe('>=3.12');
    });

    it('should use a flat layout for apps and scripts', () => {
      expect(srcPath(parseProjectConfig({ name: 'my-app', projectType: 'app' }))).toBe('my_app');
      expect(srcPath(parseProjectConfig({ name: 'tool', projectType: 'script' }))).toBe('tool');
    });

    it('should list enabled features in order', () => {
      const config = parseProjectConfig({ name: 'demo', features: { docker: true, vscode: false } });

      expect(enabledFeatures(config.features)).toEqual(['githubActions', 'docker', 'preCommit']);
    });
  });

  describe('loadProjectConfig', () => {
    afterEach(async () => {
      await cleanupFixtures();
    });

    it('should infer settings from a modern project', async () => {
      const root = await createTempFixture(fixtureConfigs.modern());

      const config = await loadProjectConfig(root);

      expect(config).toMatchObject({
        name: 'modern-app',
        projectType: 'library',
        pythonVersion: '3.12',
        license: 'MIT',
        author: { name: 'Unknown' },
        tooling: { linter: 'ruff', formatter: 'ruff', typeChecker: 'basedpyright', typeCheckingMode: 'standard' },
        features: { preCommit: true, githubActions: false, docker: false, vscode: false },
        outputDir: path.dirname(root),
      });
    });

    it('should read metadata, scripts and legacy tools', async () => {
      const root = await createTempFixture({
        name: 'config',
        files: {
          'pyproject.toml': [
            '[project]',
            'name = "Fetcher"',
            'description = "Fetches things"',
            'requires-python = ">=3.11"',
            'license = { text = "Apache-2.0" }',
            'authors = [{ name = "Jane Doe", email = "jane@example.com" }]',
            '[project.scripts]',
            'fetch = "fetcher.cli:main"',
            '[tool.black]',
            '[tool.mypy]',
          ].join('\n'),
          Dockerfile: 'FROM python:3.11\n',
        },
      });

      const config = await loadProjectConfig(root);

      expect(config).toMatchObject({
        name: 'fetcher',
        description: 'Fetches things',
        projectType: 'cli',
        pythonVersion: '3.11',
        license: 'Apache-2.0',
        author: { name: 'Jane Doe', email: 'jane@example.com' },
        tooling: { linter: 'ruff', formatter: 'black', typeChecker: 'mypy' },
        features: { docker: true },
      });
    });

    it('should fail without a pyproject.toml', async () => {
      const root = await createTempFixture({ name: 'config' });

      await expect(loadProjectConfig(root)).rejects.toThrow(`No pyproject.toml found at ${root}`);
    });

    it('should fail on a malformed pyproject.toml', async () => {
      const root = await createTempFixture({ name: 'config', files: { 'pyproject.toml': '[project\n' } });

      await expect(loadProjectConfig(root)).rejects.toThrow(`Could not parse ${path.join(root, 'pyproject.toml')}`);
    });
  });
});
