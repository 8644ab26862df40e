import path from 'node:path';
import type { IniDocument, TomlTable } from '../types/index.js';
import { readIni } from '../readers/ini.js';
import { getTable, readToml } from '../readers/toml.js';
import { existsWithin } from '../utils/fs.js';

/**
 * Read-only view of a project tree shared by the detectors of one pass.
 * Each file is read at most once per probe.
 */
export interface ProjectProbe {
  readonly root: string;
  /** Whether root/relative exists (symlinks leaving the root count as absent) */
  exists(relative: string): Promise<boolean>;
  /** Parsed pyproject.toml, or null when missing or malformed */
  pyproject(): Promise<TomlTable | null>;
  /** `[tool.<name>]` from pyproject.toml */
  toolSection(name: string): Promise<TomlTable | undefined>;
  /** Parsed ini-style file, or null when missing or malformed */
  ini(relative: string): Promise<IniDocument | null>;
}

export function createProjectProbe(root: string): ProjectProbe {
  let pyproject: Promise<TomlTable | null> | undefined;
  const iniCache = new Map<string, Promise<IniDocument | null>>();

  const readPyproject = async (): Promise<TomlTable | null> => {
    if (!(await existsWithin(root, 'pyproject.toml'))) return null;
    return readToml(path.join(root, 'pyproject.toml'));
  };

  const readIniWithin = async (relative: string): Promise<IniDocument | null> => {
    if (!(await existsWithin(root, relative))) return null;
    return readIni(path.join(root, relative));
  };

  return {
    root,

    exists(relative: string): Promise<boolean> {
      return existsWithin(root, relative);
    },

    pyproject(): Promise<TomlTable | null> {
      pyproject ??= readPyproject();
      return pyproject;
    },

    async toolSection(name: string): Promise<TomlTable | undefined> {
      return getTable(await this.pyproject(), 'tool', name);
    },

    ini(relative: string): Promise<IniDocument | null> {
      let cached = iniCache.get(relative);
      if (!cached) {
        cached = readIniWithin(relative);
        iniCache.set(relative, cached);
      }
      return cached;
    },
  };
}
