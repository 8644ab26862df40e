import path from 'node:path';
import type { Logger, MigrationStep, SourceTool } from '../types/index.js';
import { validateProjectRoot } from '../analyzers/audit.js';
import { createProjectProbe } from '../analyzers/probe.js';
import {
  detectFormatter,
  detectImportSorter,
  detectLinter,
  detectPackageManager,
  detectTypeChecker,
} from '../analyzers/tooling.js';

export const SOURCE_TOOLS: readonly SourceTool[] = ['poetry', 'pip', 'pipenv', 'setuptools'];

export function isSourceTool(value: string): value is SourceTool {
  return SOURCE_TOOLS.some((tool) => tool === value);
}

/**
 * Map the detected package manager to a migratable source tool.
 * Modern, unsupported or undetected managers give null.
 */
export async function detectSourceTool(root: string): Promise<SourceTool | null> {
  const { tool } = await detectPackageManager(root);
  return tool !== null && isSourceTool(tool) ? tool : null;
}

function packageManagerStep(root: string, source: SourceTool): MigrationStep {
  const file = (name: string) => path.join(root, name);

  switch (source) {
    case 'poetry':
      return {
        type: 'package_manager',
        source,
        target: 'uv',
        description: 'Convert Poetry pyproject.toml to PEP 621 format for uv',
        filesAffected: [file('pyproject.toml'), file('poetry.lock')],
        reversible: false,
      };
    case 'pip':
      return {
        type: 'package_manager',
        source,
        target: 'uv',
        description: 'Convert requirements.txt to pyproject.toml for uv',
        filesAffected: [file('requirements.txt'), file('pyproject.toml')],
        reversible: true,
      };
    case 'pipenv':
      return {
        type: 'package_manager',
        source,
        target: 'uv',
        description: 'Convert Pipfile to pyproject.toml for uv',
        filesAffected: [file('Pipfile'), file('pyproject.toml')],
        reversible: true,
      };
    case 'setuptools':
      return {
        type: 'package_manager',
        source,
        target: 'uv',
        description: 'Convert setup.py/setup.cfg to pyproject.toml',
        filesAffected: [file('setup.py'), file('setup.cfg'), file('pyproject.toml')],
        reversible: true,
      };
  }
}

/**
 * Build the ordered list of migration steps for a project.
 * `fromTool` overrides package-manager detection; an unrecognised value means no
 * package-manager step. An empty plan means no migration is needed.
 * Throws InvalidProjectPathError when the path is missing or not a directory.
 */
export async function createMigrationPlan(
  projectPath: string,
  fromTool?: string,
  logger?: Logger
): Promise<MigrationStep[]> {
  const root = await validateProjectRoot(projectPath);
  const steps: MigrationStep[] = [];
  const probe = createProjectProbe(root);
  const file = (name: string) => path.join(root, name);

  let source: SourceTool | null;
  if (fromTool) {
    source = isSourceTool(fromTool) ? fromTool : null;
    if (!source) logger?.warn(`Unknown source tool "${fromTool}", skipping package manager migration`);
  } else {
    const { tool } = await detectPackageManager(root, probe);
    source = tool !== null && isSourceTool(tool) ? tool : null;
  }

  if (source) {
    steps.push(packageManagerStep(root, source));
  }

  if ((await detectFormatter(root, probe)).tool === 'black') {
    steps.push({
      type: 'formatter',
      source: 'black',
      target: 'ruff',
      description: 'Migrate Black configuration to ruff format',
      filesAffected: [file('pyproject.toml')],
      reversible: true,
    });
  }

  if ((await detectImportSorter(root, probe)).tool === 'isort') {
    steps.push({
      type: 'import_sorter',
      source: 'isort',
      target: 'ruff',
      description: 'Migrate isort configuration to ruff lint.isort',
      filesAffected: [file('pyproject.toml'), file('.isort.cfg')],
      reversible: true,
    });
  }

  if ((await detectLinter(root, probe)).tool === 'flake8') {
    steps.push({
      type: 'linter',
      source: 'flake8',
      target: 'ruff',
      description: 'Migrate flake8 configuration to ruff lint',
      filesAffected: [file('pyproject.toml'), file('.flake8')],
      reversible: true,
    });
  }

  if ((await detectTypeChecker(root, probe)).tool === 'mypy') {
    steps.push({
      type: 'type_checker',
      source: 'mypy',
      target: 'basedpyright',
      description: 'Migrate mypy configuration to basedpyright',
      filesAffected: [file('pyproject.toml'), file('mypy.ini')],
      reversible: true,
    });
  }

  logger?.debug(`Migration plan: ${steps.length} step(s)`);
  return steps;
}
