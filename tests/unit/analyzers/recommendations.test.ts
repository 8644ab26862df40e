import { describe, it, expect } from 'vitest';
import type { Recommendation, ToolingSnapshot } from '../../../src/types/index.js';
import {
  calculateScore,
  countBySeverity,
  formatPercentage,
  generateCodeQualityRecommendations,
  generateToolingRecommendations,
  isModernToolchain,
  sortBySeverity,
} from '../../../src/analyzers/recommendations.js';

const none = { tool: null, evidence: {} };

function snapshot(overrides: Partial<ToolingSnapshot> = {}): ToolingSnapshot {
  return {
    packageManager: none,
    linter: none,
    formatter: none,
    importSorter: none,
    typeChecker: none,
    preCommit: false,
    ci: none,
    ...overrides,
  };
}

function rec(severity: Recommendation['severity'], message: string = severity): Recommendation {
  return { category: 'tooling', message, severity };
}

describe('isModernToolchain', () => {
  const modern = snapshot({
    packageManager: { tool: 'uv', evidence: {} },
    linter: { tool: 'ruff', evidence: {} },
    typeChecker: { tool: 'pyright', evidence: {} },
    preCommit: true,
  });

  it('should accept uv, ruff, pyright or basedpyright and pre-commit', () => {
    expect(isModernToolchain(modern)).toBe(true);
    expect(isModernToolchain({ ...modern, typeChecker: { tool: 'basedpyright', evidence: {} } })).toBe(true);
  });

  it('should reject anything missing from the combination', () => {
    expect(isModernToolchain({ ...modern, preCommit: false })).toBe(false);
    expect(isModernToolchain({ ...modern, typeChecker: { tool: 'mypy', evidence: {} } })).toBe(false);
    expect(isModernToolchain({ ...modern, packageManager: { tool: 'poetry', evidence: {} } })).toBe(false);
  });
});

describe('generateToolingRecommendations', () => {
  it('should flag every missing tool for an empty project', () => {
    const messages = generateToolingRecommendations(snapshot()).map((r) => `${r.severity}: ${r.message}`);

    expect(messages).toEqual([
      'warning: No package manager detected. Consider adding a pyproject.toml',
      'warning: No linter detected. Consider adding ruff for code quality',
      'warning: No type checker detected. Consider adding basedpyright',
      'info: No pre-commit hooks detected. Consider adding pre-commit',
      'info: No CI/CD configuration detected. Consider adding GitHub Actions',
    ]);
  });

  it('should recommend migrations for legacy tools in category order', () => {
    const recs = generateToolingRecommendations(
      snapshot({
        packageManager: { tool: 'poetry', evidence: {} },
        linter: { tool: 'flake8', evidence: {} },
        formatter: { tool: 'black', evidence: {} },
        importSorter: { tool: 'isort', evidence: {} },
        typeChecker: { tool: 'mypy', evidence: {} },
        preCommit: true,
        ci: { tool: 'github-actions', evidence: {} },
      })
    );

    expect(recs.map((r) => r.action)).toEqual([
      'pyrefit upgrade . --from poetry',
      'pyrefit upgrade . (will migrate flake8 to ruff)',
      'pyrefit upgrade . (will migrate black to ruff)',
      'pyrefit upgrade . (will migrate isort to ruff)',
      'pyrefit upgrade . (will migrate mypy to basedpyright)',
    ]);
    expect(recs.every((r) => r.category === 'tooling' && r.severity === 'info')).toBe(true);
  });

  it('should warn about setuptools', () => {
    const [first] = generateToolingRecommendations(snapshot({ packageManager: { tool: 'setuptools', evidence: {} } }));

    expect(first).toEqual({
      category: 'tooling',
      message: 'Consider migrating from setup.py to pyproject.toml (PEP 621)',
      severity: 'warning',
      action: 'pyrefit upgrade . --from setuptools',
    });
  });

  it('should not recommend anything for pdm, hatch or flit', () => {
    for (const tool of ['pdm', 'hatch', 'flit'] as const) {
      const recs = generateToolingRecommendations(
        snapshot({
          packageManager: { tool, evidence: {} },
          linter: { tool: 'ruff', evidence: {} },
          typeChecker: { tool: 'basedpyright', evidence: {} },
          preCommit: true,
          ci: { tool: 'gitlab-ci', evidence: {} },
        })
      );
      expect(recs).toEqual([]);
    }
  });

  it('should leave pylint without an action', () => {
    const recs = generateToolingRecommendations(snapshot({ linter: { tool: 'pylint', evidence: {} } }));
    const pylint = recs.find((r) => r.message.includes('pylint'));

    expect(pylint).toEqual({
      category: 'tooling',
      message: 'Consider migrating from pylint to ruff for better performance',
      severity: 'info',
    });
  });
});

describe('generateCodeQualityRecommendations', () => {
  it('should warn below 25%', () => {
    expect(generateCodeQualityRecommendations({ percentage: 10, annotated: 1, total: 10 })).toEqual([
      {
        category: 'code_quality',
        message: 'Low type annotation coverage (10%). Only 1/10 functions have type hints',
        severity: 'warning',
      },
    ]);
  });

  it('should suggest improvement between 25% and 80%', () => {
    const moderate = generateCodeQualityRecommendations({ percentage: 40, annotated: 2, total: 5 });
    const good = generateCodeQualityRecommendations({ percentage: 75, annotated: 3, total: 4 });

    expect(moderate[0].message).toBe('Moderate type annotation coverage (40%). 2/5 functions have type hints');
    expect(good[0].message).toBe('Good type annotation coverage (75%). Consider improving to 80%+');
    expect(good[0].severity).toBe('info');
  });

  it('should stay quiet at 80% and above or without functions', () => {
    expect(generateCodeQualityRecommendations({ percentage: 80, annotated: 4, total: 5 })).toEqual([]);
    expect(generateCodeQualityRecommendations({ percentage: 100, annotated: 0, total: 0 })).toEqual([]);
  });
});

describe('formatPercentage', () => {
  it('should round to whole percent', () => {
    expect(formatPercentage(66.666)).toBe('67%');
    expect(formatPercentage(100)).toBe('100%');
  });

  it('should round exact halves to the even neighbour', () => {
    expect(formatPercentage(12.5)).toBe('12%');
    expect(formatPercentage(13.5)).toBe('14%');
    expect(formatPercentage(0.5)).toBe('0%');
  });
});

describe('calculateScore', () => {
  it('should subtract a penalty per severity', () => {
    expect(calculateScore([])).toBe(100);
    expect(calculateScore([rec('critical'), rec('error'), rec('warning'), rec('info')])).toBe(64);
  });

  it('should clamp at zero', () => {
    expect(calculateScore(Array.from({ length: 6 }, () => rec('critical')))).toBe(0);
  });

  it('should never increase when a recommendation is added', () => {
    const base = [rec('warning'), rec('info')];
    for (const severity of ['critical', 'error', 'warning', 'info'] as const) {
      expect(calculateScore([...base, rec(severity)])).toBeLessThan(calculateScore(base));
    }
  });

  it('should not depend on order', () => {
    const recs = [rec('info'), rec('critical'), rec('warning')];

    expect(calculateScore([...recs].reverse())).toBe(calculateScore(recs));
  });
});

describe('countBySeverity', () => {
  it('should count each severity', () => {
    expect(countBySeverity([rec('info'), rec('info'), rec('warning')])).toEqual({
      critical: 0,
      error: 0,
      warning: 1,
      info: 2,
    });
  });
});

describe('sortBySeverity', () => {
  it('should put the most severe first and keep generation order within a severity', () => {
    const recs = [rec('info', 'a'), rec('warning', 'b'), rec('info', 'c'), rec('critical', 'd')];

    expect(sortBySeverity(recs).map((r) => r.message)).toEqual(['d', 'b', 'a', 'c']);
    expect(recs.map((r) => r.message)).toEqual(['a', 'b', 'c', 'd']);
  });
});
