import type { MigrationStep, SourceTool, UpgradeOptions, UpgradeResult } from '../types/index.js';
import { validateProjectRoot } from '../analyzers/audit.js';
import { errorMessage } from '../utils/errors.js';
import { createSilentLogger } from '../utils/logger.js';
import { createBackup } from './backup.js';
import type { MigrationExecutor } from './context.js';
import {
  migratePipenvToUv,
  migratePoetryToUv,
  migrateRequirementsToUv,
  migrateSetuptoolsToUv,
} from './package-manager.js';
import { createMigrationPlan } from './plan.js';
import { PyprojectDocument } from './pyproject-document.js';
import { migrateBlackToRuff, migrateFlake8ToRuff, migrateIsortToRuff } from './ruff.js';
import { migrateMypyToBasedpyright } from './type-checker.js';

function assertNever(value: never): never {
  throw new Error(`Unhandled migration step: ${JSON.stringify(value)}`);
}

function packageManagerExecutor(source: SourceTool): MigrationExecutor {
  switch (source) {
    case 'poetry':
      return migratePoetryToUv;
    case 'pip':
      return migrateRequirementsToUv;
    case 'pipenv':
      return migratePipenvToUv;
    case 'setuptools':
      return migrateSetuptoolsToUv;
  }
}

/**
 * Resolve the executor that applies a step
 */
export function executorFor(step: MigrationStep): MigrationExecutor {
  switch (step.type) {
    case 'package_manager':
      return packageManagerExecutor(step.source);
    case 'formatter':
      return migrateBlackToRuff;
    case 'import_sorter':
      return migrateIsortToRuff;
    case 'linter':
      return migrateFlake8ToRuff;
    case 'type_checker':
      return migrateMypyToBasedpyright;
    default:
      return assertNever(step);
  }
}

/**
 * Upgrade a Python project to uv, ruff and basedpyright.
 *
 * Runs every planned step against one in-memory pyproject.toml and writes it
 * once at the end. A failing step is recorded in `errors` and the remaining
 * steps still run. Only an invalid project root throws.
 */
export async function upgradeProject(projectPath: string, options: UpgradeOptions = {}): Promise<UpgradeResult> {
  const { fromTool, dryRun = false, backup = true, logger = createSilentLogger() } = options;
  const root = await validateProjectRoot(projectPath);

  const result: UpgradeResult = {
    success: false,
    projectPath: root,
    changesMade: [],
    errors: [],
    migrationSteps: [],
  };

  if (backup && !dryRun) {
    result.backupPath = await createBackup(root, logger);
    result.changesMade.push(`Created backup at ${result.backupPath}`);
  }

  const steps = await createMigrationPlan(root, fromTool, logger);
  result.migrationSteps = steps;

  if (steps.length === 0) {
    result.changesMade.push('No migrations needed - project may already use modern tooling');
    result.success = true;
    return result;
  }

  let document: PyprojectDocument;
  try {
    document = await PyprojectDocument.load(root);
  } catch (err) {
    // An existing file that does not parse is never overwritten
    result.errors.push(errorMessage(err));
    return result;
  }

  for (const step of steps) {
    logger.debug(`Running step: ${step.description}`);
    try {
      const changes = await executorFor(step)({ projectRoot: root, document, dryRun, logger });
      result.changesMade.push(...changes);
    } catch (err) {
      const message = `Error during ${step.description}: ${errorMessage(err)}`;
      logger.debug(message);
      result.errors.push(message);
    }
  }

  if (!dryRun && !document.isEmpty()) {
    try {
      await document.write();
      result.changesMade.push('Wrote updated pyproject.toml');
      logger.debug(`Wrote ${document.filePath}`);
    } catch (err) {
      result.errors.push(`Could not write pyproject.toml: ${errorMessage(err)}`);
    }
  }

  result.success = result.errors.length === 0;
  return result;
}
