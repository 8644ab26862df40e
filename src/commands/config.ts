import chalk from 'chalk';
import { createLogger, formatHeader, formatKeyValue } from '../utils/logger.js';
import { shapeError } from '../utils/errors.js';
import {
  enabledFeatures,
  loadProjectConfig,
  packageName,
  requiresPython,
  srcPath,
} from '../config/project-config.js';

interface CLIConfigOptions {
  json?: boolean;
}

export async function configCommand(projectPath: string | undefined, options: CLIConfigOptions): Promise<void> {
  const logger = createLogger();

  try {
    const config = await loadProjectConfig(projectPath ?? '.');

    if (options.json) {
      console.log(JSON.stringify(config, null, 2));
      return;
    }

    const features = enabledFeatures(config.features);
    const author = config.author.email ? `${config.author.name} <${config.author.email}>` : config.author.name;

    logger.log(formatHeader('Project Configuration'));
    logger.log(formatKeyValue('Name', config.name));
    logger.log(formatKeyValue('Package', packageName(config)));
    logger.log(formatKeyValue('Description', config.description));
    logger.log(formatKeyValue('Type', config.projectType));
    logger.log(formatKeyValue('Python', requiresPython(config)));
    logger.log(formatKeyValue('License', config.license));
    logger.log(formatKeyValue('Author', author));
    logger.log(formatKeyValue('Source', srcPath(config)));

    logger.log(chalk.bold('\nTooling:'));
    logger.log(`  ${formatKeyValue('Linter', config.tooling.linter)}`);
    logger.log(`  ${formatKeyValue('Formatter', config.tooling.formatter)}`);
    logger.log(
      `  ${formatKeyValue('Type checker', `${config.tooling.typeChecker} (${config.tooling.typeCheckingMode})`)}`
    );

    logger.log(chalk.bold('\nFeatures:'));
    logger.log(`  ${features.length > 0 ? features.join(', ') : chalk.gray('none')}`);
    logger.log('');
  } catch (error) {
    const shaped = shapeError(error);

    if (options.json) {
      console.log(JSON.stringify({ error: shaped.message, hint: shaped.hint }, null, 2));
    } else {
      logger.error(shaped.message);
      logger.log(`  Hint: ${shaped.hint}`);
    }
    process.exitCode = 1;
  }
}
