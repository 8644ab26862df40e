import path from 'node:path';
import type { Logger } from '../types/index.js';
import { existsWithin, removeFile } from '../utils/fs.js';
import type { PyprojectDocument } from './pyproject-document.js';

/**
 * What every migration executor works against
 */
export interface MigrationContext {
  projectRoot: string;
  document: PyprojectDocument;
  dryRun: boolean;
  logger: Logger;
}

/**
 * Applies one migration step and returns the changes it made, in order
 */
export type MigrationExecutor = (ctx: MigrationContext) => Promise<string[]>;

/**
 * Delete a config file made redundant by a migration (skipped on dry runs).
 * Returns true when the file was removed.
 */
export async function removeProjectFile(ctx: MigrationContext, name: string): Promise<boolean> {
  if (ctx.dryRun || !(await existsWithin(ctx.projectRoot, name))) {
    return false;
  }
  await removeFile(path.join(ctx.projectRoot, name));
  ctx.logger.debug(`Removed ${name}`);
  return true;
}

/**
 * Whether a project file exists (symlinks leaving the project count as absent)
 */
export function hasProjectFile(ctx: MigrationContext, name: string): Promise<boolean> {
  return existsWithin(ctx.projectRoot, name);
}
