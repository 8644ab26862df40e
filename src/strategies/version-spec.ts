import type { TomlValue } from '../types/index.js';
import { getString, getStringArray, isTable } from '../readers/toml.js';

/**
 * Convert a Poetry/Pipenv style version constraint into a PEP 508 requirement.
 *
 * - `*` or empty: bare name
 * - `^1.2` / `~1.2`: `>=1.2`
 * - `~=1.2`, `>=1`, `<2,>=1`: passed through
 * - `1.2` (no operator): exact pin `==1.2`
 */
export function toRequirement(name: string, spec: string): string {
  const constraint = spec.trim();
  if (constraint === '' || constraint === '*') return name;
  if (constraint.startsWith('~=')) return `${name}${constraint}`;
  if (constraint.startsWith('^') || constraint.startsWith('~')) {
    return `${name}>=${constraint.slice(1).trim()}`;
  }
  if (/^[<>=!~]/.test(constraint)) return `${name}${constraint}`;
  return `${name}==${constraint}`;
}

/**
 * Requirement for a dependency declared as a string or an inline table
 * (`{ version = "^1.0", extras = ["a"] }`). Git/path tables keep the bare name.
 */
export function dependencyToRequirement(name: string, spec: TomlValue): string {
  if (typeof spec === 'string') {
    return toRequirement(name, spec);
  }
  if (isTable(spec)) {
    const extras = getStringArray(spec, 'extras') ?? [];
    const fullName = extras.length > 0 ? `${name}[${extras.join(',')}]` : name;
    return toRequirement(fullName, getString(spec, 'version') ?? '');
  }
  return name;
}

/**
 * Python constraint (`^3.11` -> `>=3.11`, anything else unchanged)
 */
export function toRequiresPython(spec: string): string {
  const constraint = spec.trim();
  if (!constraint.startsWith('~=') && (constraint.startsWith('^') || constraint.startsWith('~'))) {
    return `>=${constraint.slice(1).trim()}`;
  }
  return constraint;
}
