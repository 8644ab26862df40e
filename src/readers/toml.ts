import { parse, stringify } from 'smol-toml';
import type { TomlTable, TomlValue } from '../types/index.js';
import { pathExists, readFile } from '../utils/fs.js';

/**
 * Narrow a parsed value to a TOML table
 */
export function isTable(value: unknown): value is TomlTable {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Parse TOML text. Malformed input yields null rather than an error.
 * Integers past the safe range come back as bigint.
 */
export function parseToml(content: string): TomlTable | null {
  try {
    const data: unknown = parse(content, { integersAsBigInt: 'asNeeded' });
    return isTable(data) ? data : null;
  } catch {
    return null;
  }
}

/**
 * Read a TOML file. Missing, unreadable and malformed files all yield null.
 */
export async function readToml(filePath: string): Promise<TomlTable | null> {
  if (!(await pathExists(filePath))) return null;
  try {
    return parseToml(await readFile(filePath));
  } catch {
    return null;
  }
}

export function stringifyToml(table: TomlTable): string {
  return stringify(table);
}

/**
 * Walk nested tables, returning undefined as soon as a key is missing or not a table
 */
export function getTable(table: TomlTable | null | undefined, ...keys: string[]): TomlTable | undefined {
  let current: TomlValue | undefined = table ?? undefined;
  for (const key of keys) {
    if (!isTable(current)) return undefined;
    current = current[key];
  }
  return isTable(current) ? current : undefined;
}

export function getString(table: TomlTable | undefined, key: string): string | undefined {
  const value = table?.[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read an array of strings, dropping non-string entries
 */
export function getStringArray(table: TomlTable | undefined, key: string): string[] | undefined {
  const value = table?.[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Loose truthiness for boolean-ish settings (true, 1, "true")
 */
export function isTruthy(value: TomlValue | undefined): boolean {
  if (typeof value === 'string') return value.length > 0 && value.toLowerCase() !== 'false';
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'bigint') return value !== 0n;
  if (Array.isArray(value)) return value.length > 0;
  if (isTable(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}
