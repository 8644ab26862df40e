import chalk from 'chalk';
import type { AuditResult, Logger } from '../types/index.js';
import {
  createLogger,
  formatHeader,
  formatKeyValue,
  formatSeverity,
} from '../utils/logger.js';
import { shapeError } from '../utils/errors.js';
import { auditProject } from '../analyzers/audit.js';
import { countBySeverity, sortBySeverity } from '../analyzers/recommendations.js';

/**
 * CLI options passed from commander
 */
interface CLIAuditOptions {
  verbose?: boolean;
  json?: boolean;
}

const TOOLING_LABELS: Array<[key: string, label: string]> = [
  ['package_manager', 'Package manager'],
  ['linter', 'Linter'],
  ['formatter', 'Formatter'],
  ['import_sorter', 'Import sorter'],
  ['type_checker', 'Type checker'],
  ['pre_commit', 'Pre-commit'],
  ['ci', 'CI/CD'],
  ['type_coverage', 'Type coverage'],
];

function scoreColor(score: number): (text: string) => string {
  if (score >= 80) return chalk.green;
  if (score >= 50) return chalk.yellow;
  return chalk.red;
}

/**
 * Print audit results in human-readable format
 */
export function printAuditReport(result: AuditResult, logger: Logger): void {
  logger.log(formatHeader('Project Audit'));
  logger.log(formatKeyValue('Project', result.projectPath));

  logger.log(chalk.bold('\nDetected tooling:'));
  for (const [key, label] of TOOLING_LABELS) {
    const value = result.toolingDetected[key];
    logger.log(`  ${formatKeyValue(label, value ?? chalk.gray('none'))}`);
  }

  logger.log(chalk.bold('\nHealth score:'));
  logger.log(`  ${scoreColor(result.score)(`${result.score}/100`)}`);

  if (result.toolingDetected.status === 'modern') {
    logger.log('');
    logger.success('Project already uses modern tooling');
    return;
  }

  if (result.recommendations.length === 0) {
    logger.log('');
    logger.success('No recommendations');
    return;
  }

  logger.log(chalk.bold('\nRecommendations:'));
  for (const rec of sortBySeverity(result.recommendations)) {
    logger.log(`  [${formatSeverity(rec.severity)}] ${rec.message}`);
    if (rec.action) {
      logger.log(`    ${chalk.cyan('→')} ${rec.action}`);
    }
  }

  const counts = countBySeverity(result.recommendations);
  logger.log(chalk.bold('\nSummary:'));
  logger.log(
    `  ${chalk.red(counts.critical + counts.error)} errors, ` +
      `${chalk.yellow(counts.warning)} warnings, ` +
      `${chalk.blue(counts.info)} suggestions`
  );
  logger.log('');
}

/**
 * Main audit command handler
 */
export async function auditCommand(projectPath: string | undefined, options: CLIAuditOptions): Promise<void> {
  const logger = createLogger(options.verbose);

  try {
    const result = await auditProject(projectPath ?? '.', options.json ? undefined : logger);

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printAuditReport(result, logger);
    }
  } catch (error) {
    const shaped = shapeError(error);

    if (options.json) {
      console.log(JSON.stringify({ error: shaped.message, hint: shaped.hint }, null, 2));
    } else {
      logger.error(`Audit failed: ${shaped.message}`);
      logger.log(`  Hint: ${shaped.hint}`);
    }
    process.exitCode = 1;
  }
}
