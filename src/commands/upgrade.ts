import chalk from 'chalk';
import type { Logger, UpgradeResult } from '../types/index.js';
import { createLogger, createSilentLogger, formatHeader, formatKeyValue, formatList } from '../utils/logger.js';
import { shapeError } from '../utils/errors.js';
import { promptConfirm } from '../utils/prompts.js';
import { validateProjectRoot } from '../analyzers/audit.js';
import { createMigrationPlan } from '../strategies/plan.js';
import { upgradeProject } from '../strategies/upgrade.js';
import { printMigrationPlan } from './plan.js';

/**
 * CLI options passed from commander
 */
interface CLIUpgradeOptions {
  from?: string;
  dryRun?: boolean;
  backup: boolean;
  yes?: boolean;
  verbose?: boolean;
}

function printUpgradeResult(result: UpgradeResult, dryRun: boolean, logger: Logger): void {
  logger.log(chalk.bold(dryRun ? '\nChanges that would be made:' : '\nChanges made:'));
  logger.log(result.changesMade.length > 0 ? formatList(result.changesMade) : '  None');

  if (result.errors.length > 0) {
    logger.log(chalk.bold('\nErrors:'));
    for (const error of result.errors) {
      logger.error(error);
    }
  }

  if (result.backupPath) {
    logger.log('');
    logger.log(formatKeyValue('Backup', result.backupPath));
  }

  logger.log('');
  if (!result.success) {
    logger.error('Upgrade finished with errors');
  } else if (dryRun) {
    logger.info('Dry run complete. No files were changed');
  } else {
    logger.success('Upgrade complete');
  }
}

/**
 * Main upgrade command handler
 */
export async function upgradeCommand(projectPath: string | undefined, options: CLIUpgradeOptions): Promise<void> {
  const logger = createLogger(options.verbose);
  const dryRun = options.dryRun ?? false;

  try {
    const root = await validateProjectRoot(projectPath ?? '.');

    logger.log(formatHeader(dryRun ? 'Project Upgrade (dry run)' : 'Project Upgrade'));
    logger.log(formatKeyValue('Project', root));

    const steps = await createMigrationPlan(root, options.from, createSilentLogger());
    if (steps.length > 0) {
      logger.log(chalk.bold('\nPlanned migrations:'));
      printMigrationPlan(steps, logger);

      if (!dryRun && !options.yes) {
        const proceed = await promptConfirm('Apply these migrations?', true);
        if (!proceed) {
          logger.warn('Upgrade cancelled');
          return;
        }
      }
    }

    const result = await upgradeProject(root, {
      fromTool: options.from,
      dryRun,
      backup: options.backup,
      logger,
    });

    printUpgradeResult(result, dryRun, logger);
    if (!result.success) {
      process.exitCode = 1;
    }
  } catch (error) {
    const shaped = shapeError(error);
    logger.error(`Upgrade failed: ${shaped.message}`);
    logger.log(`  Hint: ${shaped.hint}`);
    process.exitCode = 1;
  }
}
