import type {
  DetectionResult,
  Formatter,
  ImportSorter,
  Linter,
  Logger,
  PackageManager,
  ToolingSnapshot,
  TypeChecker,
} from '../types/index.js';
import { getStringArray, getTable } from '../readers/toml.js';
import { listFiles } from '../utils/fs.js';
import { createProjectProbe, type ProjectProbe } from './probe.js';
import { fileRule, iniSectionRule, runRules, toolSectionRule, type DetectionRule } from './rules.js';
import { detectCI } from './ci.js';

const PACKAGE_MANAGER_RULES: ReadonlyArray<DetectionRule<PackageManager>> = [
  fileRule('uv', 'uv.lock', 'lock_file'),
  fileRule('poetry', 'poetry.lock', 'lock_file'),
  toolSectionRule('poetry', 'poetry'),
  toolSectionRule('pdm', 'pdm'),
  toolSectionRule('hatch', 'hatch'),
  toolSectionRule('flit', 'flit'),
  {
    tool: 'pipenv',
    match: async (probe) =>
      (await probe.exists('Pipfile')) || (await probe.exists('Pipfile.lock'))
        ? { config: 'Pipfile' }
        : null,
  },
  {
    tool: 'pip',
    match: async (probe) => {
      if (!(await probe.exists('requirements.txt'))) return null;
      const evidence: Record<string, string> = { requirements: 'requirements.txt' };
      // Record companion requirements files (requirements-dev.txt, ...)
      for (const file of (await listFiles(probe.root)).sort()) {
        if (file !== 'requirements.txt' && /^requirements.*\.txt$/.test(file)) {
          evidence[file] = file;
        }
      }
      return evidence;
    },
  },
  fileRule('setuptools', 'setup.py'),
  fileRule('setuptools', 'setup.cfg'),
];

const LINTER_RULES: ReadonlyArray<DetectionRule<Linter>> = [
  fileRule('ruff', 'ruff.toml'),
  toolSectionRule('ruff', 'ruff'),
  fileRule('flake8', '.flake8'),
  iniSectionRule('flake8', 'setup.cfg', 'flake8'),
  fileRule('pylint', '.pylintrc'),
  fileRule('pylint', 'pylintrc'),
  toolSectionRule('pylint', 'pylint'),
];

const FORMATTER_RULES: ReadonlyArray<DetectionRule<Formatter>> = [
  toolSectionRule('ruff', 'ruff', (ruff) => 'format' in ruff || 'line-length' in ruff),
  toolSectionRule('black', 'black'),
  toolSectionRule('autopep8', 'autopep8'),
  iniSectionRule('autopep8', 'setup.cfg', 'autopep8'),
  fileRule('yapf', '.style.yapf'),
  toolSectionRule('yapf', 'yapf'),
];

const IMPORT_SORTER_RULES: ReadonlyArray<DetectionRule<ImportSorter>> = [
  toolSectionRule('ruff', 'ruff', (ruff) => {
    const lint = getTable(ruff, 'lint');
    if (!lint) return false;
    if (getTable(lint, 'isort')) return true;
    // Any "I"-prefixed rule selection enables import sorting
    return (getStringArray(lint, 'select') ?? []).some((code) => code.startsWith('I'));
  }),
  fileRule('isort', '.isort.cfg'),
  toolSectionRule('isort', 'isort'),
  iniSectionRule('isort', 'setup.cfg', 'isort'),
];

const TYPE_CHECKER_RULES: ReadonlyArray<DetectionRule<TypeChecker>> = [
  toolSectionRule('basedpyright', 'basedpyright'),
  fileRule('pyright', 'pyrightconfig.json'),
  toolSectionRule('pyright', 'pyright'),
  fileRule('mypy', 'mypy.ini'),
  fileRule('mypy', '.mypy.ini'),
  toolSectionRule('mypy', 'mypy'),
  iniSectionRule('mypy', 'setup.cfg', 'mypy'),
  fileRule('pytype', 'pytype.cfg'),
];

/**
 * Detect the package manager (uv, poetry, pdm, hatch, flit, pipenv, pip, setuptools)
 */
export async function detectPackageManager(
  root: string,
  probe: ProjectProbe = createProjectProbe(root)
): Promise<DetectionResult<PackageManager>> {
  return runRules(probe, PACKAGE_MANAGER_RULES);
}

/**
 * Detect the linter (ruff, flake8, pylint)
 */
export async function detectLinter(
  root: string,
  probe: ProjectProbe = createProjectProbe(root)
): Promise<DetectionResult<Linter>> {
  return runRules(probe, LINTER_RULES);
}

/**
 * Detect the formatter (ruff, black, autopep8, yapf)
 */
export async function detectFormatter(
  root: string,
  probe: ProjectProbe = createProjectProbe(root)
): Promise<DetectionResult<Formatter>> {
  return runRules(probe, FORMATTER_RULES);
}

/**
 * Detect the import sorter (ruff's isort rules, or isort itself)
 */
export async function detectImportSorter(
  root: string,
  probe: ProjectProbe = createProjectProbe(root)
): Promise<DetectionResult<ImportSorter>> {
  return runRules(probe, IMPORT_SORTER_RULES);
}

/**
 * Detect the type checker (basedpyright, pyright, mypy, pytype)
 */
export async function detectTypeChecker(
  root: string,
  probe: ProjectProbe = createProjectProbe(root)
): Promise<DetectionResult<TypeChecker>> {
  return runRules(probe, TYPE_CHECKER_RULES);
}

/**
 * Check if pre-commit is configured
 */
export async function detectPreCommit(
  root: string,
  probe: ProjectProbe = createProjectProbe(root)
): Promise<boolean> {
  return probe.exists('.pre-commit-config.yaml');
}

/**
 * Run every detector over one shared probe
 */
export async function detectTooling(root: string, logger?: Logger): Promise<ToolingSnapshot> {
  const probe = createProjectProbe(root);

  const snapshot: ToolingSnapshot = {
    packageManager: await detectPackageManager(root, probe),
    linter: await detectLinter(root, probe),
    formatter: await detectFormatter(root, probe),
    importSorter: await detectImportSorter(root, probe),
    typeChecker: await detectTypeChecker(root, probe),
    preCommit: await detectPreCommit(root, probe),
    ci: await detectCI(root, probe),
  };

  logger?.debug(
    `Tooling detected: package manager=${snapshot.packageManager.tool ?? 'none'}, ` +
      `linter=${snapshot.linter.tool ?? 'none'}, formatter=${snapshot.formatter.tool ?? 'none'}, ` +
      `import sorter=${snapshot.importSorter.tool ?? 'none'}, type checker=${snapshot.typeChecker.tool ?? 'none'}, ` +
      `pre-commit=${snapshot.preCommit ? 'yes' : 'no'}, ci=${snapshot.ci.tool ?? 'none'}`
  );

  return snapshot;
}
