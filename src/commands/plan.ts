import chalk from 'chalk';
import type { Logger, MigrationStep } from '../types/index.js';
import { createLogger, formatHeader, formatKeyValue } from '../utils/logger.js';
import { shapeError } from '../utils/errors.js';
import { validateProjectRoot } from '../analyzers/audit.js';
import { createMigrationPlan } from '../strategies/plan.js';

/**
 * CLI options passed from commander
 */
interface CLIPlanOptions {
  from?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Print migration steps as a numbered list
 */
export function printMigrationPlan(steps: MigrationStep[], logger: Logger): void {
  steps.forEach((step, index) => {
    const marker = step.reversible ? '' : chalk.yellow(' (irreversible)');
    logger.log(`  ${index + 1}. ${step.description}${marker}`);
    logger.log(chalk.gray(`     ${step.source} → ${step.target}`));
  });
}

/**
 * Main plan command handler: previews migrations without touching the project
 */
export async function planCommand(projectPath: string | undefined, options: CLIPlanOptions): Promise<void> {
  const logger = createLogger(options.verbose);

  try {
    const root = await validateProjectRoot(projectPath ?? '.');
    const steps = await createMigrationPlan(root, options.from, options.json ? undefined : logger);

    if (options.json) {
      console.log(JSON.stringify({ projectPath: root, steps }, null, 2));
      return;
    }

    logger.log(formatHeader('Migration Plan'));
    logger.log(formatKeyValue('Project', root));

    if (steps.length === 0) {
      logger.log('');
      logger.success('No migrations needed - project may already use modern tooling');
      return;
    }

    logger.log('');
    printMigrationPlan(steps, logger);
    logger.log('');
    logger.info(`Run ${chalk.cyan(`pyrefit upgrade ${projectPath ?? '.'}`)} to apply`);
  } catch (error) {
    const shaped = shapeError(error);

    if (options.json) {
      console.log(JSON.stringify({ error: shaped.message, hint: shaped.hint }, null, 2));
    } else {
      logger.error(`Planning failed: ${shaped.message}`);
      logger.log(`  Hint: ${shaped.hint}`);
    }
    process.exitCode = 1;
  }
}
