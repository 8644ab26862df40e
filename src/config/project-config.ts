import path from 'node:path';
import { z, type ZodIssue } from 'zod';
import type { TomlTable } from '../types/index.js';
import { getString, getTable, isTable, readToml } from '../readers/toml.js';
import { createProjectProbe } from '../analyzers/probe.js';
import { detectFormatter, detectLinter, detectTypeChecker } from '../analyzers/tooling.js';
import { ActionableError } from '../utils/errors.js';
import { pathExists } from '../utils/fs.js';

const NAME_PATTERN = /^[a-z][a-z0-9_-]*$/;
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

// Python keywords, compared case-insensitively
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue', 'def',
  'del', 'elif', 'else', 'except', 'finally', 'for', 'from', 'global', 'if',
  'import', 'in', 'is', 'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise',
  'return', 'try', 'while', 'with', 'yield', 'true', 'false', 'none',
]);

export const PROJECT_TYPES = ['library', 'app', 'cli', 'api', 'script'] as const;
export const PYTHON_VERSIONS = ['3.11', '3.12', '3.13'] as const;
export const LICENSES = ['MIT', 'Apache-2.0', 'GPL-3.0-only', 'BSD-3-Clause', 'Unlicense', 'Proprietary'] as const;
export const TYPE_CHECKING_MODES = ['off', 'basic', 'standard', 'strict', 'all'] as const;

const toolName = z.string().transform((value) => value.trim().toLowerCase());

export const AuthorSchema = z
  .object({
    name: z.string().min(1).max(100),
    email: z.string().regex(EMAIL_PATTERN, 'Invalid email format').optional(),
  })
  .strict();

export const ToolingSchema = z
  .object({
    linter: toolName.default('ruff'),
    formatter: toolName.default('ruff'),
    typeChecker: toolName.default('basedpyright'),
    typeCheckingMode: z.enum(TYPE_CHECKING_MODES).default('standard'),
  })
  .strict();

export const FeaturesSchema = z
  .object({
    githubActions: z.boolean().default(true),
    docker: z.boolean().default(false),
    devcontainer: z.boolean().default(false),
    docs: z.boolean().default(false),
    preCommit: z.boolean().default(true),
    vscode: z.boolean().default(true),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    name: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(
        z
          .string()
          .min(1)
          .max(100)
          .regex(
            NAME_PATTERN,
            'Names must start with a letter and contain only letters, numbers, hyphens, and underscores'
          )
          .refine((value) => !RESERVED_WORDS.has(value), (value) => ({
            message: `'${value}' is a Python reserved word and cannot be used as a project name`,
          }))
      ),
    description: z.string().max(500).default('A Python project'),
    projectType: z.enum(PROJECT_TYPES).default('library'),
    pythonVersion: z.enum(PYTHON_VERSIONS).default('3.12'),
    license: z.enum(LICENSES).default('MIT'),
    author: AuthorSchema.default({ name: 'Your Name' }),
    tooling: ToolingSchema.default({}),
    features: FeaturesSchema.default({}),
    outputDir: z.string().default(() => process.cwd()),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.projectType !== 'script') return;
    if (config.features.docker) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['features', 'docker'],
        message: 'Docker is not applicable for single-file scripts',
      });
    }
    if (config.features.docs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['features', 'docs'],
        message: 'Documentation setup is not applicable for single-file scripts',
      });
    }
  });

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ProjectConfigInput = z.input<typeof ProjectConfigSchema>;
export type ProjectType = ProjectConfig['projectType'];
export type Features = ProjectConfig['features'];

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${location}: ${issue.message}`;
  });
}

/**
 * Validate raw settings into a ProjectConfig, filling defaults
 */
export function parseProjectConfig(input: ProjectConfigInput): ProjectConfig {
  const result = ProjectConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ActionableError(
      `Invalid project configuration:\n${formatConfigIssues(result.error.issues).join('\n')}`,
      'Fix the listed fields and try again'
    );
  }
  return result.data;
}

/** Importable package name (hyphens become underscores) */
export function packageName(config: ProjectConfig): string {
  return config.name.replace(/-/g, '_');
}

export function projectDir(config: ProjectConfig): string {
  return path.join(config.outputDir, config.name);
}

export function usesSrcLayout(projectType: ProjectType): boolean {
  return projectType === 'library' || projectType === 'cli' || projectType === 'api';
}

/** Source directory relative to the project root */
export function srcPath(config: ProjectConfig): string {
  return usesSrcLayout(config.projectType) ? path.join('src', packageName(config)) : packageName(config);
}

export function testPath(): string {
  return 'tests';
}

export function enabledFeatures(features: Features): Array<keyof Features> {
  const names: Array<keyof Features> = ['githubActions', 'docker', 'devcontainer', 'docs', 'preCommit', 'vscode'];
  return names.filter((name) => features[name]);
}

export function requiresPython(config: ProjectConfig): string {
  return `>=${config.pythonVersion}`;
}

function inferPythonVersion(requires: string): ProjectConfig['pythonVersion'] {
  if (requires.includes('3.13')) return '3.13';
  if (requires.includes('3.11')) return '3.11';
  return '3.12';
}

function inferLicense(project: TomlTable): ProjectConfig['license'] {
  const value = project.license;
  const text = isTable(value) ? getString(value, 'text') : typeof value === 'string' ? value : undefined;
  return LICENSES.find((license) => license === text) ?? 'MIT';
}

function inferAuthor(project: TomlTable): ProjectConfigInput['author'] {
  const authors = project.authors;
  const first = Array.isArray(authors) ? authors[0] : undefined;
  if (isTable(first)) {
    return { name: getString(first, 'name') ?? 'Unknown', email: getString(first, 'email') };
  }
  if (typeof first === 'string') {
    return { name: first };
  }
  return { name: 'Unknown' };
}

function inferTypeCheckingMode(tool: TomlTable | undefined): ProjectConfig['tooling']['typeCheckingMode'] {
  const mode =
    getString(getTable(tool, 'basedpyright'), 'typeCheckingMode') ??
    getString(getTable(tool, 'pyright'), 'typeCheckingMode');
  return TYPE_CHECKING_MODES.find((candidate) => candidate === mode) ?? 'standard';
}

/**
 * Infer a ProjectConfig from an existing project's pyproject.toml
 */
export async function loadProjectConfig(root: string): Promise<ProjectConfig> {
  const projectRoot = path.resolve(root);
  const pyprojectPath = path.join(projectRoot, 'pyproject.toml');
  if (!(await pathExists(pyprojectPath))) {
    throw new ActionableError(
      `No pyproject.toml found at ${projectRoot}`,
      'Run this command from the root of a Python project'
    );
  }

  const data = await readToml(pyprojectPath);
  if (!data) {
    throw new ActionableError(`Could not parse ${pyprojectPath}`, 'Check pyproject.toml for TOML syntax errors');
  }

  const project = getTable(data, 'project') ?? {};
  const tool = getTable(data, 'tool');
  const scripts = getTable(project, 'scripts');

  const probe = createProjectProbe(projectRoot);
  const exists = (...segments: string[]) => probe.exists(path.join(...segments));

  return parseProjectConfig({
    name: getString(project, 'name') ?? path.basename(projectRoot),
    description: getString(project, 'description') ?? 'A Python project',
    projectType: scripts && Object.keys(scripts).length > 0 ? 'cli' : 'library',
    pythonVersion: inferPythonVersion(getString(project, 'requires-python') ?? '>=3.12'),
    license: inferLicense(project),
    author: inferAuthor(project),
    tooling: {
      linter: (await detectLinter(projectRoot, probe)).tool ?? 'ruff',
      formatter: (await detectFormatter(projectRoot, probe)).tool ?? 'ruff',
      typeChecker: (await detectTypeChecker(projectRoot, probe)).tool ?? 'basedpyright',
      typeCheckingMode: inferTypeCheckingMode(tool),
    },
    features: {
      githubActions: await exists('.github', 'workflows'),
      preCommit: await exists('.pre-commit-config.yaml'),
      vscode: await exists('.vscode', 'settings.json'),
      docker: await exists('Dockerfile'),
      docs: await exists('mkdocs.yml'),
      devcontainer: await exists('.devcontainer', 'devcontainer.json'),
    },
    outputDir: path.dirname(projectRoot),
  });
}
