import path from 'node:path';
import type { TomlTable, TomlValue } from '../types/index.js';
import { readIni } from '../readers/ini.js';
import { readRequirements } from '../readers/requirements.js';
import { getString, getStringArray, getTable, isTable, parseToml } from '../readers/toml.js';
import { readFile } from '../utils/fs.js';
import { hasProjectFile, removeProjectFile, type MigrationContext, type MigrationExecutor } from './context.js';
import { dependencyToRequirement, toRequiresPython } from './version-spec.js';

const AUTHOR_PATTERN = /^(.+?)\s*<(.+?)>/;

const POETRY_URL_KEYS: Array<[string, string]> = [
  ['homepage', 'Homepage'],
  ['repository', 'Repository'],
  ['documentation', 'Documentation'],
];

function requirementsFrom(table: TomlTable | undefined, skip: ReadonlySet<string> = new Set()): string[] {
  if (!table) return [];
  return Object.entries(table)
    .filter(([name]) => !skip.has(name))
    .map(([name, spec]) => dependencyToRequirement(name, spec));
}

function setDevDependencies(ctx: MigrationContext, deps: string[]): void {
  ctx.document.table('project', 'optional-dependencies').dev = deps;
}

function parseAuthor(author: string): TomlTable {
  const match = author.match(AUTHOR_PATTERN);
  return match ? { name: match[1].trim(), email: match[2] } : { name: author };
}

function seedDocument(ctx: MigrationContext): void {
  if (ctx.document.isEmpty()) {
    ctx.document.seedSkeleton(path.basename(ctx.projectRoot));
    ctx.logger.debug('Seeded a minimal pyproject.toml');
  }
}

/**
 * Rewrite `[tool.poetry]` into PEP 621 `[project]` metadata and drop poetry.lock
 */
export const migratePoetryToUv: MigrationExecutor = async (ctx) => {
  const { document } = ctx;
  if (!document.existed) return ['No pyproject.toml found'];

  const poetry = document.find('tool', 'poetry');
  if (!poetry) return ['No [tool.poetry] section found'];

  const changes: string[] = [];
  const project = document.table('project');

  const name = getString(poetry, 'name');
  if (name !== undefined) {
    project.name = name;
    changes.push(`Migrated project name: ${name}`);
  }

  const version = getString(poetry, 'version');
  if (version !== undefined) {
    project.version = version;
    changes.push(`Migrated version: ${version}`);
  }

  const description = getString(poetry, 'description');
  if (description !== undefined) {
    project.description = description;
    changes.push('Migrated description');
  }

  const authors = (getStringArray(poetry, 'authors') ?? []).map(parseAuthor);
  if (authors.length > 0) {
    project.authors = authors;
    changes.push('Migrated authors');
  }

  const readme = getString(poetry, 'readme');
  if (readme !== undefined) {
    project.readme = readme;
  } else if (await hasProjectFile(ctx, 'README.md')) {
    project.readme = 'README.md';
  }

  const license = getString(poetry, 'license');
  if (license !== undefined) {
    project.license = { text: license };
    changes.push(`Migrated license: ${license}`);
  }

  for (const key of ['keywords', 'classifiers']) {
    const values = getStringArray(poetry, key);
    if (values) {
      project[key] = values;
      changes.push(`Migrated ${key}`);
    }
  }

  const urls: TomlTable = { ...getTable(poetry, 'urls') };
  for (const [poetryKey, urlKey] of POETRY_URL_KEYS) {
    const url = getString(poetry, poetryKey);
    if (url !== undefined) urls[urlKey] = url;
  }
  if (Object.keys(urls).length > 0) {
    project.urls = urls;
    changes.push('Migrated project URLs');
  }

  const dependencies = getTable(poetry, 'dependencies');
  const python = getString(dependencies, 'python');
  if (python !== undefined) {
    const requiresPython = toRequiresPython(python);
    project['requires-python'] = requiresPython;
    changes.push(`Migrated Python requirement: ${requiresPython}`);
  }

  const deps = requirementsFrom(dependencies, new Set(['python']));
  if (deps.length > 0) {
    project.dependencies = deps;
    changes.push(`Migrated ${deps.length} dependencies`);
  }

  const devDeps = [
    ...requirementsFrom(getTable(poetry, 'group', 'dev', 'dependencies')),
    ...requirementsFrom(getTable(poetry, 'dev-dependencies')),
  ];
  if (devDeps.length > 0) {
    setDevDependencies(ctx, devDeps);
    changes.push(`Migrated ${devDeps.length} dev dependencies`);
  }

  const scripts = getTable(poetry, 'scripts');
  if (scripts) {
    project.scripts = scripts;
    changes.push('Migrated scripts/entry points');
  }

  document.data['build-system'] = {
    requires: ['hatchling'],
    'build-backend': 'hatchling.build',
  };
  changes.push('Updated build-system to use hatchling');

  document.delete('tool', 'poetry');
  changes.push('Removed [tool.poetry] section');

  const tool = document.find('tool');
  if (tool && Object.keys(tool).length === 0) {
    document.delete('tool');
  }

  if (await removeProjectFile(ctx, 'poetry.lock')) {
    changes.push('Removed poetry.lock');
  }

  return changes;
};

/**
 * Move requirements.txt (and requirements-dev.txt) into `[project]`.
 * The requirements files are left in place.
 */
export const migrateRequirementsToUv: MigrationExecutor = async (ctx) => {
  if (!(await hasProjectFile(ctx, 'requirements.txt'))) {
    return ['No requirements.txt found'];
  }

  const deps = (await readRequirements(path.join(ctx.projectRoot, 'requirements.txt'))) ?? [];
  if (deps.length === 0) {
    return ['No dependencies found in requirements.txt'];
  }

  const changes: string[] = [];
  seedDocument(ctx);
  ctx.document.table('project').dependencies = deps;
  changes.push(`Migrated ${deps.length} dependencies from requirements.txt`);

  if (await hasProjectFile(ctx, 'requirements-dev.txt')) {
    const devDeps =
      (await readRequirements(path.join(ctx.projectRoot, 'requirements-dev.txt'), {
        skipAllOptions: true,
      })) ?? [];
    if (devDeps.length > 0) {
      setDevDependencies(ctx, devDeps);
      changes.push(`Migrated ${devDeps.length} dev dependencies from requirements-dev.txt`);
    }
  }

  return changes;
};

function pipfileRequirements(packages: TomlValue | undefined): string[] {
  return isTable(packages) ? requirementsFrom(packages) : [];
}

/**
 * Move Pipfile packages, dev-packages and the Python requirement into `[project]`
 */
export const migratePipenvToUv: MigrationExecutor = async (ctx) => {
  if (!(await hasProjectFile(ctx, 'Pipfile'))) {
    return ['No Pipfile found'];
  }

  const pipfile = parseToml(await readFile(path.join(ctx.projectRoot, 'Pipfile')));
  if (!pipfile) {
    return ['Could not parse Pipfile'];
  }

  const changes: string[] = [];
  seedDocument(ctx);
  const project = ctx.document.table('project');

  const deps = pipfileRequirements(pipfile.packages);
  if (deps.length > 0) {
    project.dependencies = deps;
    changes.push(`Migrated ${deps.length} dependencies from Pipfile`);
  }

  const devDeps = pipfileRequirements(pipfile['dev-packages']);
  if (devDeps.length > 0) {
    setDevDependencies(ctx, devDeps);
    changes.push(`Migrated ${devDeps.length} dev dependencies from Pipfile`);
  }

  const requires = getTable(pipfile, 'requires');
  const pythonVersion = getString(requires, 'python_version') ?? getString(requires, 'python_full_version');
  if (pythonVersion !== undefined) {
    project['requires-python'] = `>=${pythonVersion}`;
    changes.push(`Migrated Python requirement: >=${pythonVersion}`);
  }

  return changes;
};

/**
 * Move setup.cfg metadata and options into `[project]`. A bare setup.py only
 * produces guidance.
 */
export const migrateSetuptoolsToUv: MigrationExecutor = async (ctx) => {
  const changes: string[] = [];
  const hasSetupCfg = await hasProjectFile(ctx, 'setup.cfg');

  if (hasSetupCfg) {
    const cfg = await readIni(path.join(ctx.projectRoot, 'setup.cfg'));
    if (!cfg) {
      changes.push('Warning: Could not fully parse setup.cfg');
    } else {
      seedDocument(ctx);
      const project = ctx.document.table('project');

      const metadata = cfg.metadata;
      if (metadata) {
        if (metadata.name) project.name = metadata.name;
        if (metadata.version) project.version = metadata.version;
        if (metadata.description) project.description = metadata.description;
        if (metadata.author) {
          const author: TomlTable = { name: metadata.author };
          if (metadata.author_email) author.email = metadata.author_email;
          project.authors = [author];
        }
        if (metadata.license) project.license = { text: metadata.license };
        changes.push('Migrated metadata from setup.cfg');
      }

      const options = cfg.options;
      if (options) {
        if (options.python_requires) project['requires-python'] = options.python_requires;
        if (options.install_requires !== undefined) {
          const deps = splitLines(options.install_requires);
          project.dependencies = deps;
          changes.push(`Migrated ${deps.length} dependencies`);
        }
      }

      const extras = cfg['options.extras_require'];
      if (extras && Object.keys(extras).length > 0) {
        const optional = ctx.document.table('project', 'optional-dependencies');
        for (const [group, value] of Object.entries(extras)) {
          optional[group] = splitLines(value);
        }
        changes.push(`Migrated ${Object.keys(extras).length} optional dependency groups`);
      }
    }
  }

  if (!hasSetupCfg && (await hasProjectFile(ctx, 'setup.py'))) {
    changes.push('Found setup.py - manual migration recommended');
    changes.push("Tip: Run 'python setup.py egg_info' to extract metadata");
  }

  return changes;
};

/**
 * Requirement lists in setup.cfg hold one requirement per line
 */
function splitLines(value: string): string[] {
  return value
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
