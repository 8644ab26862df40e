import path from 'node:path';
import type { IniDocument, TomlTable, TomlValue } from '../types/index.js';
import { iniBoolean, readIni, splitList } from '../readers/ini.js';
import { getStringArray } from '../readers/toml.js';
import { MigrationError } from '../utils/errors.js';
import { hasProjectFile, removeProjectFile, type MigrationContext, type MigrationExecutor } from './context.js';

const BLACK_DEFAULT_LINE_LENGTH = 88;

/**
 * Read `[section]` from the first of `files` that declares it
 */
async function findIniSection(
  ctx: MigrationContext,
  candidates: Array<[file: string, section: string]>
): Promise<Record<string, string> | undefined> {
  const cache = new Map<string, IniDocument | null>();
  for (const [file, section] of candidates) {
    if (!cache.has(file)) {
      cache.set(file, (await hasProjectFile(ctx, file)) ? await readIni(path.join(ctx.projectRoot, file)) : null);
    }
    const doc = cache.get(file);
    if (doc && Object.hasOwn(doc, section)) {
      return doc[section];
    }
  }
  return undefined;
}

/**
 * Add rule codes to `lint.select` that are not already there
 */
function selectRules(lint: TomlTable, codes: string[]): string[] {
  const select = lint.select;
  const current: TomlValue[] = Array.isArray(select) ? select : [];
  const added = codes.filter((code) => !current.includes(code));
  lint.select = [...current, ...added];
  return added;
}

/**
 * Replace `[tool.black]` with ruff's line-length, target-version and format settings
 */
export const migrateBlackToRuff: MigrationExecutor = async (ctx) => {
  const { document } = ctx;
  const changes: string[] = [];
  const black = document.find('tool', 'black') ?? {};
  const ruff = document.table('tool', 'ruff');

  const lineLength = black['line-length'];
  if (lineLength !== undefined) {
    ruff['line-length'] = lineLength;
    changes.push(`Migrated line-length: ${String(lineLength)}`);
  } else if (ruff['line-length'] === undefined) {
    ruff['line-length'] = BLACK_DEFAULT_LINE_LENGTH;
    changes.push(`Set line-length to ${BLACK_DEFAULT_LINE_LENGTH} (Black default)`);
  }

  // Black lists every supported version; ruff takes one
  const targetVersion = black['target-version'];
  const target = Array.isArray(targetVersion) ? targetVersion.at(-1) : targetVersion;
  if (typeof target === 'string' && target.startsWith('py')) {
    ruff['target-version'] = target;
    changes.push(`Migrated target-version: ${target}`);
  }

  const format = document.table('tool', 'ruff', 'format');
  format['quote-style'] = 'double';

  const skipMagicTrailingComma = black['skip-magic-trailing-comma'];
  if (skipMagicTrailingComma !== undefined) {
    format['skip-magic-trailing-comma'] = skipMagicTrailingComma;
  }

  if (document.delete('tool', 'black')) {
    changes.push('Removed [tool.black] section');
  }

  return changes;
};

interface IsortSettings {
  knownFirstParty?: string[];
  knownThirdParty?: string[];
  knownLocalFolder?: string[];
  forceSingleLine?: boolean;
  combineAsImports?: boolean;
}

const ISORT_LISTS = [
  ['known_first_party', 'knownFirstParty', 'known-first-party'],
  ['known_third_party', 'knownThirdParty', 'known-third-party'],
  ['known_local_folder', 'knownLocalFolder', 'known-local-folder'],
] as const;

const ISORT_FLAGS = [
  ['force_single_line', 'forceSingleLine', 'force-single-line'],
  ['combine_as_imports', 'combineAsImports', 'combine-as-imports'],
] as const;

function isortFromToml(table: TomlTable): IsortSettings {
  const settings: IsortSettings = {};
  for (const [key, field] of ISORT_LISTS) {
    const value = table[key];
    const list = typeof value === 'string' ? splitList(value) : getStringArray(table, key);
    if (list) settings[field] = list;
  }
  for (const [key, field] of ISORT_FLAGS) {
    const value = table[key];
    if (typeof value === 'boolean') settings[field] = value;
  }
  return settings;
}

function isortFromIni(section: Record<string, string>): IsortSettings {
  const settings: IsortSettings = {};
  for (const [key, field] of ISORT_LISTS) {
    if (section[key] !== undefined) settings[field] = splitList(section[key]);
  }
  for (const [key, field] of ISORT_FLAGS) {
    const value = iniBoolean(section[key]);
    if (value !== undefined) settings[field] = value;
  }
  return settings;
}

async function readIsortSettings(ctx: MigrationContext): Promise<IsortSettings> {
  const fromPyproject = ctx.document.find('tool', 'isort');
  if (fromPyproject) return isortFromToml(fromPyproject);

  const section = await findIniSection(ctx, [
    ['.isort.cfg', 'settings'],
    ['.isort.cfg', 'isort'],
    ['setup.cfg', 'isort'],
  ]);
  return section ? isortFromIni(section) : {};
}

/**
 * Move isort settings into `[tool.ruff.lint.isort]` and enable the `I` rules
 */
export const migrateIsortToRuff: MigrationExecutor = async (ctx) => {
  const { document } = ctx;
  const changes: string[] = [];
  const settings = await readIsortSettings(ctx);

  const lint = document.table('tool', 'ruff', 'lint');

  for (const [key, field, ruffKey] of [...ISORT_LISTS, ...ISORT_FLAGS]) {
    const value = settings[field];
    if (value !== undefined) {
      document.table('tool', 'ruff', 'lint', 'isort')[ruffKey] = value;
      changes.push(`Migrated ${key}`);
    }
  }

  if (!Array.isArray(lint.select)) {
    lint.select = ['E', 'F', 'I'];
    changes.push('Added I (isort) rules to ruff lint.select');
  } else if (selectRules(lint, ['I']).length > 0) {
    changes.push('Added I (isort) to ruff lint.select');
  }

  if (document.delete('tool', 'isort')) {
    changes.push('Removed [tool.isort] section');
  }

  if (await removeProjectFile(ctx, '.isort.cfg')) {
    changes.push('Removed .isort.cfg file');
  }

  return changes;
};

function parseLineLength(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new MigrationError(`Invalid max-line-length: ${value}`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Move flake8 settings (`.flake8` or setup.cfg) into `[tool.ruff]` and drop `.flake8`
 */
export const migrateFlake8ToRuff: MigrationExecutor = async (ctx) => {
  const { document } = ctx;
  const changes: string[] = [];

  const flake8 =
    (await findIniSection(ctx, [
      ['.flake8', 'flake8'],
      ['setup.cfg', 'flake8'],
    ])) ?? {};

  const maxLineLength = flake8['max-line-length'];
  const lineLength = maxLineLength === undefined ? undefined : parseLineLength(maxLineLength);

  const ruff = document.table('tool', 'ruff');
  const lint = document.table('tool', 'ruff', 'lint');

  if (lineLength !== undefined) {
    ruff['line-length'] = lineLength;
    changes.push(`Migrated max-line-length: ${lineLength}`);
  }

  const ignored = [
    ...splitList(flake8.ignore ?? ''),
    ...splitList(flake8['extend-ignore'] ?? ''),
  ];
  if (ignored.length > 0) {
    lint.ignore = [...new Set(ignored)];
    changes.push(`Migrated ${ignored.length} ignore rules`);
  }

  const excluded = splitList(flake8.exclude ?? '');
  if (excluded.length > 0) {
    ruff.exclude = excluded;
    changes.push(`Migrated ${excluded.length} exclude patterns`);
  }

  const selected = splitList(flake8.select ?? '');
  if (selected.length > 0) {
    selectRules(lint, selected);
    changes.push(`Migrated ${selected.length} select rules`);
  } else if (!Array.isArray(lint.select)) {
    lint.select = ['E', 'F', 'W'];
    changes.push('Added E, F, W rules to ruff lint.select');
  }

  if (await removeProjectFile(ctx, '.flake8')) {
    changes.push('Removed .flake8 file');
  }

  return changes;
};
