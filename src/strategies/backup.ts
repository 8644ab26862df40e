import path from 'node:path';
import type { Logger } from '../types/index.js';
import { copyFile, ensureDir, existsWithin } from '../utils/fs.js';

export const BACKUP_PREFIX = '.pyrefit_backup_';

/**
 * Config files copied before an upgrade touches anything
 */
export const BACKUP_FILES = [
  'pyproject.toml',
  'poetry.lock',
  'requirements.txt',
  'requirements-dev.txt',
  'setup.py',
  'setup.cfg',
  '.flake8',
  '.isort.cfg',
  'mypy.ini',
  '.mypy.ini',
  'Pipfile',
  'Pipfile.lock',
  '.pre-commit-config.yaml',
] as const;

/**
 * UTC timestamp as YYYYMMDD_HHMMSS
 */
export function backupTimestamp(date: Date = new Date()): string {
  return date.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
}

/**
 * Copy the project's config files into a timestamped backup directory
 */
export async function createBackup(root: string, logger?: Logger, now: Date = new Date()): Promise<string> {
  const backupDir = path.join(root, `${BACKUP_PREFIX}${backupTimestamp(now)}`);
  await ensureDir(backupDir);

  for (const file of BACKUP_FILES) {
    if (await existsWithin(root, file)) {
      await copyFile(path.join(root, file), path.join(backupDir, file));
      logger?.debug(`Backed up ${file}`);
    }
  }

  return backupDir;
}
