import path from 'node:path';
import { patch } from '@decimalturn/toml-patch';
import type { TomlTable } from '../types/index.js';
import { isTable, parseToml, stringifyToml } from '../readers/toml.js';
import { MigrationError } from '../utils/errors.js';
import { existsWithin, readFile, writeFile } from '../utils/fs.js';

export const PYPROJECT_FILE = 'pyproject.toml';

/**
 * The single in-memory pyproject.toml shared by every step of an upgrade.
 * Steps mutate it; the orchestrator writes it once at the end.
 */
export class PyprojectDocument {
  private constructor(
    readonly filePath: string,
    readonly data: TomlTable,
    /** Whether pyproject.toml existed when the document was loaded */
    readonly existed: boolean,
    /** Text the document was parsed from; writes patch it to keep comments and layout */
    private readonly source: string | null = null
  ) {}

  /**
   * Load pyproject.toml from a project root. A missing file gives an empty document;
   * a file that exists but does not parse is a MigrationError.
   */
  static async load(root: string): Promise<PyprojectDocument> {
    const filePath = path.join(root, PYPROJECT_FILE);
    if (!(await existsWithin(root, PYPROJECT_FILE))) {
      return new PyprojectDocument(filePath, {}, false);
    }
    const source = await readFile(filePath);
    const data = parseToml(source);
    if (!data) {
      throw new MigrationError(`Could not parse ${PYPROJECT_FILE}`);
    }
    return new PyprojectDocument(filePath, data, true, source);
  }

  static fromTable(filePath: string, data: TomlTable, existed = true): PyprojectDocument {
    return new PyprojectDocument(filePath, data, existed);
  }

  static fromText(filePath: string, source: string): PyprojectDocument {
    const data = parseToml(source);
    if (!data) {
      throw new MigrationError(`Could not parse ${PYPROJECT_FILE}`);
    }
    return new PyprojectDocument(filePath, data, true, source);
  }

  /**
   * Nested table at keys, or undefined when any part is missing
   */
  find(...keys: string[]): TomlTable | undefined {
    let current: TomlTable = this.data;
    for (const key of keys) {
      const next = current[key];
      if (!isTable(next)) return undefined;
      current = next;
    }
    return current;
  }

  /**
   * Nested table at keys, creating missing tables on the way
   */
  table(...keys: string[]): TomlTable {
    let current: TomlTable = this.data;
    for (const key of keys) {
      const next = current[key];
      if (next === undefined) {
        const created: TomlTable = {};
        current[key] = created;
        current = created;
      } else if (isTable(next)) {
        current = next;
      } else {
        throw new MigrationError(`Expected [${keys.join('.')}] to be a table in ${PYPROJECT_FILE}`);
      }
    }
    return current;
  }

  /**
   * Remove the table at keys. Returns whether anything was removed.
   */
  delete(...keys: string[]): boolean {
    const last = keys.at(-1);
    if (last === undefined) return false;
    const parent = this.find(...keys.slice(0, -1));
    if (!parent || !Object.hasOwn(parent, last)) return false;
    delete parent[last];
    return true;
  }

  isEmpty(): boolean {
    return Object.keys(this.data).length === 0;
  }

  /**
   * Fill an empty document with minimal project metadata and a hatchling build system
   */
  seedSkeleton(name: string): void {
    if (!this.isEmpty()) return;
    this.data.project = {
      name,
      version: '0.1.0',
      'requires-python': '>=3.11',
    };
    this.data['build-system'] = {
      requires: ['hatchling'],
      'build-backend': 'hatchling.build',
    };
  }

  /**
   * Render the document. A loaded file is patched in place so comments and
   * untouched sections keep their formatting; a new file is written fresh.
   */
  stringify(): string {
    return this.source === null ? stringifyToml(this.data) : patch(this.source, this.data);
  }

  async write(): Promise<void> {
    await writeFile(this.filePath, this.stringify());
  }
}
