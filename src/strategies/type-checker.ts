import path from 'node:path';
import type { TomlTable } from '../types/index.js';
import { iniBoolean, readIni } from '../readers/ini.js';
import { isTruthy } from '../readers/toml.js';
import { hasProjectFile, removeProjectFile, type MigrationContext, type MigrationExecutor } from './context.js';

const MYPY_FILES = ['mypy.ini', '.mypy.ini'];

interface MypySettings {
  strict: boolean;
  warnReturnAny: boolean;
  disallowUntypedDefs: boolean;
  ignoreMissingImports: boolean;
  pythonVersion?: string;
}

type TypeCheckingMode = 'strict' | 'standard' | 'basic';

function mypyFromToml(table: TomlTable): MypySettings {
  const version = table.python_version;
  return {
    strict: isTruthy(table.strict),
    warnReturnAny: isTruthy(table.warn_return_any),
    disallowUntypedDefs: isTruthy(table.disallow_untyped_defs),
    ignoreMissingImports: isTruthy(table.ignore_missing_imports),
    pythonVersion: typeof version === 'string' || typeof version === 'number' ? String(version) : undefined,
  };
}

function mypyFromIni(section: Record<string, string>): MypySettings {
  return {
    strict: iniBoolean(section.strict) ?? false,
    warnReturnAny: iniBoolean(section.warn_return_any) ?? false,
    disallowUntypedDefs: iniBoolean(section.disallow_untyped_defs) ?? false,
    ignoreMissingImports: iniBoolean(section.ignore_missing_imports) ?? false,
    pythonVersion: section.python_version,
  };
}

/**
 * `[tool.mypy]` wins over mypy.ini, .mypy.ini and setup.cfg `[mypy]`, in that order
 */
async function readMypySettings(ctx: MigrationContext): Promise<MypySettings | undefined> {
  const fromPyproject = ctx.document.find('tool', 'mypy');
  if (fromPyproject) return mypyFromToml(fromPyproject);

  for (const file of [...MYPY_FILES, 'setup.cfg']) {
    if (!(await hasProjectFile(ctx, file))) continue;
    const doc = await readIni(path.join(ctx.projectRoot, file));
    if (doc && Object.hasOwn(doc, 'mypy')) {
      return mypyFromIni(doc.mypy);
    }
  }
  return undefined;
}

function typeCheckingMode(settings: MypySettings | undefined): TypeCheckingMode {
  if (settings?.strict) return 'strict';
  if (settings?.warnReturnAny || settings?.disallowUntypedDefs) return 'standard';
  return 'basic';
}

/**
 * Translate mypy settings into `[tool.basedpyright]` and remove the mypy config
 */
export const migrateMypyToBasedpyright: MigrationExecutor = async (ctx) => {
  const { document } = ctx;
  const changes: string[] = [];
  const settings = await readMypySettings(ctx);
  const basedpyright = document.table('tool', 'basedpyright');

  const mode = typeCheckingMode(settings);
  basedpyright.typeCheckingMode = mode;
  changes.push(
    mode === 'strict'
      ? 'Set typeCheckingMode to strict (from mypy strict)'
      : `Set typeCheckingMode to ${mode}`
  );

  if (settings?.pythonVersion !== undefined) {
    basedpyright.pythonVersion = settings.pythonVersion;
    changes.push(`Migrated python_version: ${settings.pythonVersion}`);
  }

  if (settings?.ignoreMissingImports) {
    basedpyright.reportMissingImports = false;
    changes.push('Migrated ignore_missing_imports');
  }

  if (document.delete('tool', 'mypy')) {
    changes.push('Removed [tool.mypy] section');
  }

  for (const file of MYPY_FILES) {
    if (await removeProjectFile(ctx, file)) {
      changes.push(`Removed ${file}`);
    }
  }

  return changes;
};
