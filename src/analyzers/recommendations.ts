import type {
  Formatter,
  ImportSorter,
  Linter,
  PackageManager,
  Recommendation,
  Severity,
  ToolingSnapshot,
  TypeChecker,
  TypeCoverage,
} from '../types/index.js';

const CLI = 'pyrefit';

const SEVERITY_PENALTY: Record<Severity, number> = {
  critical: 20,
  error: 10,
  warning: 5,
  info: 1,
};

const PACKAGE_MANAGER_ADVICE: Partial<Record<PackageManager, Omit<Recommendation, 'category'>>> = {
  poetry: {
    message: 'Consider migrating from Poetry to uv for faster dependency resolution',
    severity: 'info',
    action: `${CLI} upgrade . --from poetry`,
  },
  pip: {
    message: 'Consider migrating from pip/requirements.txt to uv with pyproject.toml',
    severity: 'info',
    action: `${CLI} upgrade . --from pip`,
  },
  pipenv: {
    message: 'Consider migrating from Pipenv to uv for better performance',
    severity: 'info',
    action: `${CLI} upgrade . --from pipenv`,
  },
  setuptools: {
    message: 'Consider migrating from setup.py to pyproject.toml (PEP 621)',
    severity: 'warning',
    action: `${CLI} upgrade . --from setuptools`,
  },
};

const LINTER_ADVICE: Partial<Record<Linter, Omit<Recommendation, 'category'>>> = {
  flake8: {
    message: 'Consider migrating from flake8 to ruff for better performance',
    severity: 'info',
    action: `${CLI} upgrade . (will migrate flake8 to ruff)`,
  },
  pylint: {
    message: 'Consider migrating from pylint to ruff for better performance',
    severity: 'info',
  },
};

const FORMATTER_ADVICE: Partial<Record<Formatter, Omit<Recommendation, 'category'>>> = {
  black: {
    message: 'Consider migrating from black to ruff format for better performance',
    severity: 'info',
    action: `${CLI} upgrade . (will migrate black to ruff)`,
  },
  autopep8: {
    message: 'Consider migrating from autopep8 to ruff format',
    severity: 'info',
  },
  yapf: {
    message: 'Consider migrating from yapf to ruff format',
    severity: 'info',
  },
};

const IMPORT_SORTER_ADVICE: Partial<Record<ImportSorter, Omit<Recommendation, 'category'>>> = {
  isort: {
    message: 'Consider migrating from isort to ruff (handles import sorting)',
    severity: 'info',
    action: `${CLI} upgrade . (will migrate isort to ruff)`,
  },
};

const TYPE_CHECKER_ADVICE: Partial<Record<TypeChecker, Omit<Recommendation, 'category'>>> = {
  mypy: {
    message: 'Consider migrating from mypy to basedpyright for stricter checking',
    severity: 'info',
    action: `${CLI} upgrade . (will migrate mypy to basedpyright)`,
  },
  pytype: {
    message: 'Consider migrating from pytype to basedpyright',
    severity: 'info',
  },
};

function tooling(advice: Omit<Recommendation, 'category'>): Recommendation {
  return { category: 'tooling', ...advice };
}

/**
 * The fixed combination treated as already modern: uv, ruff,
 * basedpyright or pyright, and pre-commit hooks.
 */
export function isModernToolchain(snapshot: ToolingSnapshot): boolean {
  return (
    snapshot.packageManager.tool === 'uv' &&
    snapshot.linter.tool === 'ruff' &&
    (snapshot.typeChecker.tool === 'basedpyright' || snapshot.typeChecker.tool === 'pyright') &&
    snapshot.preCommit
  );
}

/**
 * Map detected tooling to recommendations, one per legacy or missing tool
 */
export function generateToolingRecommendations(snapshot: ToolingSnapshot): Recommendation[] {
  const recommendations: Recommendation[] = [];

  const { packageManager, linter, formatter, importSorter, typeChecker } = snapshot;

  if (packageManager.tool === null) {
    recommendations.push(
      tooling({
        message: 'No package manager detected. Consider adding a pyproject.toml',
        severity: 'warning',
      })
    );
  } else {
    const advice = PACKAGE_MANAGER_ADVICE[packageManager.tool];
    if (advice) recommendations.push(tooling(advice));
  }

  if (linter.tool === null) {
    recommendations.push(
      tooling({
        message: 'No linter detected. Consider adding ruff for code quality',
        severity: 'warning',
        action: 'Add a [tool.ruff] section to pyproject.toml',
      })
    );
  } else {
    const advice = LINTER_ADVICE[linter.tool];
    if (advice) recommendations.push(tooling(advice));
  }

  const formatterAdvice = formatter.tool ? FORMATTER_ADVICE[formatter.tool] : undefined;
  if (formatterAdvice) recommendations.push(tooling(formatterAdvice));

  const sorterAdvice = importSorter.tool ? IMPORT_SORTER_ADVICE[importSorter.tool] : undefined;
  if (sorterAdvice) recommendations.push(tooling(sorterAdvice));

  if (typeChecker.tool === null) {
    recommendations.push(
      tooling({
        message: 'No type checker detected. Consider adding basedpyright',
        severity: 'warning',
      })
    );
  } else {
    const advice = TYPE_CHECKER_ADVICE[typeChecker.tool];
    if (advice) recommendations.push(tooling(advice));
  }

  if (!snapshot.preCommit) {
    recommendations.push(
      tooling({
        message: 'No pre-commit hooks detected. Consider adding pre-commit',
        severity: 'info',
        action: 'Add a .pre-commit-config.yaml with ruff hooks',
      })
    );
  }

  if (snapshot.ci.tool === null) {
    recommendations.push(
      tooling({
        message: 'No CI/CD configuration detected. Consider adding GitHub Actions',
        severity: 'info',
        action: 'Add a workflow under .github/workflows',
      })
    );
  }

  return recommendations;
}

/**
 * Recommend more type hints below 80% coverage. A project without functions gets nothing.
 */
export function generateCodeQualityRecommendations(coverage: TypeCoverage): Recommendation[] {
  const { percentage, annotated, total } = coverage;
  if (total === 0) return [];

  const pct = formatPercentage(percentage);

  if (percentage < 25) {
    return [
      {
        category: 'code_quality',
        message: `Low type annotation coverage (${pct}). Only ${annotated}/${total} functions have type hints`,
        severity: 'warning',
      },
    ];
  }
  if (percentage < 50) {
    return [
      {
        category: 'code_quality',
        message: `Moderate type annotation coverage (${pct}). ${annotated}/${total} functions have type hints`,
        severity: 'info',
      },
    ];
  }
  if (percentage < 80) {
    return [
      {
        category: 'code_quality',
        message: `Good type annotation coverage (${pct}). Consider improving to 80%+`,
        severity: 'info',
      },
    ];
  }
  return [];
}

function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function formatPercentage(percentage: number): string {
  // Ties go to the even neighbour: 12.5 shows as 12%
  return `${roundHalfEven(percentage)}%`;
}

/**
 * Health score: 100 minus a fixed penalty per recommendation, clamped to 0-100
 */
export function calculateScore(recommendations: readonly Recommendation[]): number {
  let score = 100;
  for (const rec of recommendations) {
    score -= SEVERITY_PENALTY[rec.severity];
  }
  return Math.max(0, Math.min(100, score));
}

export function countBySeverity(recommendations: readonly Recommendation[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { critical: 0, error: 0, warning: 0, info: 0 };
  for (const rec of recommendations) {
    counts[rec.severity]++;
  }
  return counts;
}

const SEVERITY_ORDER: Severity[] = ['critical', 'error', 'warning', 'info'];

/**
 * Most severe first; generation order is kept within a severity
 */
export function sortBySeverity(recommendations: readonly Recommendation[]): Recommendation[] {
  return [...recommendations].sort(
    (a, b) => SEVERITY_ORDER.indexOf(a.severity) - SEVERITY_ORDER.indexOf(b.severity)
  );
}
