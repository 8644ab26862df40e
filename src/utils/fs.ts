import fs from 'fs-extra';
import path from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.ensureDir(dirPath);
}

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  return fs.pathExists(filePath);
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Read a file as a string
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, 'utf-8');
}

/**
 * Read a file as raw bytes
 */
export async function readBytes(filePath: string): Promise<Buffer> {
  return fs.readFile(filePath);
}

/**
 * Write a string to a file
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Copy a single file, keeping its timestamps
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  await fs.copy(src, dest, { overwrite: true, preserveTimestamps: true });
}

/**
 * Remove a file (no-op when it is already gone)
 */
export async function removeFile(filePath: string): Promise<void> {
  await fs.remove(filePath);
}

/**
 * List files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  return entries.filter((e) => e.isFile()).map((e) => e.name);
}

/**
 * Whether target is root itself or lies below it
 */
export function isWithin(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Resolve a path through symlinks and report whether it stays inside root.
 * Paths that cannot be resolved (dangling links, missing files) are outside.
 */
export async function resolvesInside(root: string, target: string): Promise<boolean> {
  try {
    const [realRoot, realTarget] = await Promise.all([fs.realpath(root), fs.realpath(target)]);
    return isWithin(realRoot, realTarget);
  } catch {
    return false;
  }
}

export interface WalkOptions {
  /** File extension to collect, including the dot */
  extension: string;
  /** Directory names skipped at any depth */
  excludeDirs: ReadonlySet<string>;
}

/**
 * Recursively collect files under root with the given extension.
 * Symlinks are followed only when they resolve inside root; each real
 * directory is visited once.
 */
export async function walkFiles(root: string, options: WalkOptions): Promise<string[]> {
  const results: string[] = [];
  const visited = new Set<string>();
  const realRoot = await fs.realpath(root);

  async function visit(dir: string): Promise<void> {
    const realDir = await fs.realpath(dir);
    if (visited.has(realDir)) return;
    visited.add(realDir);

    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      let isDir = entry.isDirectory();
      let isFile = entry.isFile();

      if (entry.isSymbolicLink()) {
        if (!(await resolvesInside(realRoot, fullPath))) continue;
        const stat = await fs.stat(fullPath);
        isDir = stat.isDirectory();
        isFile = stat.isFile();
      }

      if (isDir) {
        if (!options.excludeDirs.has(entry.name)) {
          await visit(fullPath);
        }
      } else if (isFile && entry.name.endsWith(options.extension)) {
        results.push(fullPath);
      }
    }
  }

  await visit(root);
  return results;
}

/**
 * Check that root/relative exists without escaping root through a symlink
 * anywhere along the path
 */
export async function existsWithin(root: string, relative: string): Promise<boolean> {
  const fullPath = path.join(root, relative);
  if (!(await fs.pathExists(fullPath))) return false;
  return resolvesInside(root, fullPath);
}
