#!/usr/bin/env node
import { Command, Option } from 'commander';
import { auditCommand } from './commands/audit.js';
import { planCommand } from './commands/plan.js';
import { upgradeCommand } from './commands/upgrade.js';
import { configCommand } from './commands/config.js';
import { SOURCE_TOOLS } from './strategies/plan.js';

const program = new Command();

const fromOption = () =>
  new Option('--from <tool>', 'Source package manager (auto-detected when omitted)').choices(SOURCE_TOOLS);

program
  .name('pyrefit')
  .description('Audit Python projects and migrate them to uv, ruff and basedpyright')
  .version('0.1.0');

program
  .command('audit')
  .description('Audit a project for outdated tooling and score its health')
  .argument('[path]', 'Project root (defaults to current directory)')
  .option('--json', 'Output as JSON')
  .option('-v, --verbose', 'Verbose output')
  .action(auditCommand);

program
  .command('plan')
  .description('Show the migrations an upgrade would run, without changing anything')
  .argument('[path]', 'Project root (defaults to current directory)')
  .addOption(fromOption())
  .option('--json', 'Output as JSON')
  .option('-v, --verbose', 'Verbose output')
  .action(planCommand);

program
  .command('upgrade')
  .description('Migrate a project to modern tooling')
  .argument('[path]', 'Project root (defaults to current directory)')
  .addOption(fromOption())
  .option('--dry-run', 'Show changes without writing anything')
  .option('--no-backup', 'Skip the backup of config files')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('-v, --verbose', 'Verbose output')
  .action(upgradeCommand);

program
  .command('config')
  .description('Show the project configuration inferred from pyproject.toml')
  .argument('[path]', 'Project root (defaults to current directory)')
  .option('--json', 'Output as JSON')
  .action(configCommand);

program.parse();
