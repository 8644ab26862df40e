import type { DetectionResult, Evidence, TomlTable } from '../types/index.js';
import type { ProjectProbe } from './probe.js';

/**
 * One signal in a detector cascade: resolves to an evidence map when it fires
 */
export interface DetectionRule<T extends string> {
  tool: T;
  match: (probe: ProjectProbe) => Promise<Evidence | null>;
}

/**
 * Evaluate rules in order; the first one that fires wins
 */
export async function runRules<T extends string>(
  probe: ProjectProbe,
  rules: ReadonlyArray<DetectionRule<T>>
): Promise<DetectionResult<T>> {
  for (const rule of rules) {
    const evidence = await rule.match(probe);
    if (evidence) {
      return { tool: rule.tool, evidence };
    }
  }
  return { tool: null, evidence: {} };
}

/**
 * Fires when a file exists in the project root
 */
export function fileRule<T extends string>(tool: T, file: string, key = 'config'): DetectionRule<T> {
  return {
    tool,
    match: async (probe) => ((await probe.exists(file)) ? { [key]: file } : null),
  };
}

/**
 * Fires when pyproject.toml has `[tool.<section>]` (optionally satisfying a predicate)
 */
export function toolSectionRule<T extends string>(
  tool: T,
  section: string,
  predicate: (table: TomlTable) => boolean = () => true
): DetectionRule<T> {
  return {
    tool,
    match: async (probe) => {
      const table = await probe.toolSection(section);
      return table && predicate(table) ? { config: 'pyproject.toml' } : null;
    },
  };
}

/**
 * Fires when an ini-style file declares a section
 */
export function iniSectionRule<T extends string>(tool: T, file: string, section: string): DetectionRule<T> {
  return {
    tool,
    match: async (probe) => {
      const doc = await probe.ini(file);
      return doc && Object.hasOwn(doc, section) ? { config: file } : null;
    },
  };
}
