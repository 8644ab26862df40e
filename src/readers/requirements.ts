import { pathExists, readFile } from '../utils/fs.js';

export interface RequirementsOptions {
  /** Skip every pip option line (any line starting with `-`), not just -r/-e */
  skipAllOptions?: boolean;
}

/**
 * Parse a requirements file into one requirement string per entry.
 * Blank lines, comments and include/editable directives are skipped.
 */
export function parseRequirements(content: string, options: RequirementsOptions = {}): string[] {
  const requirements: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/\s+#.*$/, '').trim();
    if (!line || line.startsWith('#')) continue;
    if (line.startsWith('-r') || line.startsWith('-e')) continue;
    if (options.skipAllOptions && line.startsWith('-')) continue;
    requirements.push(line);
  }

  return requirements;
}

/**
 * Read a requirements file; null when it does not exist
 */
export async function readRequirements(
  filePath: string,
  options: RequirementsOptions = {}
): Promise<string[] | null> {
  if (!(await pathExists(filePath))) return null;
  return parseRequirements(await readFile(filePath), options);
}
