import type { IniDocument } from '../types/index.js';
import { pathExists, readFile } from '../utils/fs.js';

const SECTION_HEADER = /^\[([^\]]+)\]/;
const KEY_VALUE = /^([^=:]+?)\s*[=:]\s*(.*)$/;

/**
 * Parse an ini-style document the way setup.cfg, .flake8 and mypy.ini are read:
 * full-line `#`/`;` comments, `=` or `:` separators, lower-cased keys and
 * indented continuation lines joined with newlines.
 *
 * Returns null for input a config parser would reject (a key before any
 * section header, or a line that is neither a header nor a key).
 */
export function parseIni(content: string): IniDocument | null {
  const doc: IniDocument = {};
  let section: Record<string, string> | null = null;
  let currentKey: string | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (line === '' || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    // Continuation of the previous value
    if (/^\s/.test(rawLine) && section && currentKey !== null) {
      section[currentKey] = section[currentKey] === '' ? line : `${section[currentKey]}\n${line}`;
      continue;
    }

    const header = line.match(SECTION_HEADER);
    if (header) {
      const name = header[1].trim();
      section = Object.hasOwn(doc, name) ? doc[name] : {};
      doc[name] = section;
      currentKey = null;
      continue;
    }

    const pair = line.match(KEY_VALUE);
    if (!pair || !section) {
      return null;
    }

    currentKey = pair[1].trim().toLowerCase();
    section[currentKey] = pair[2].trim();
  }

  return doc;
}

/**
 * Read an ini-style file. Missing, unreadable and malformed files yield null.
 */
export async function readIni(filePath: string): Promise<IniDocument | null> {
  if (!(await pathExists(filePath))) return null;
  try {
    return parseIni(await readFile(filePath));
  } catch {
    return null;
  }
}

/**
 * Interpret an ini value as a boolean (1/yes/true/on, 0/no/false/off).
 * Anything else is undefined.
 */
export function iniBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'yes', 'true', 'on'].includes(normalized)) return true;
  if (['0', 'no', 'false', 'off'].includes(normalized)) return false;
  return undefined;
}

/**
 * Split a comma- or newline-separated ini value, trimming entries and dropping empties
 */
export function splitList(value: string): string[] {
  return value
    .split(/[,\n]/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
