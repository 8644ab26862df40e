// ============================================================================
// Structured configuration documents
// ============================================================================

/**
 * A value inside a parsed TOML document
 */
export type TomlValue = string | number | bigint | boolean | Date | TomlValue[] | TomlTable;

/**
 * A TOML table (the document root is one too)
 */
export interface TomlTable {
  [key: string]: TomlValue;
}

/**
 * A parsed ini-style document: section name -> (lower-cased key -> raw value)
 */
export type IniDocument = Record<string, Record<string, string>>;

// ============================================================================
// Detection
// ============================================================================

/**
 * Auxiliary metadata explaining why a detector returned a tool
 */
export type Evidence = Record<string, string>;

/**
 * Outcome of a single detector
 */
export interface DetectionResult<T extends string = string> {
  /** Detected tool, or null when nothing matched */
  tool: T | null;
  /** Which files or sections supplied the evidence */
  evidence: Evidence;
}

export type PackageManager = 'uv' | 'poetry' | 'pdm' | 'hatch' | 'flit' | 'pipenv' | 'pip' | 'setuptools';

export type Linter = 'ruff' | 'flake8' | 'pylint';

export type Formatter = 'ruff' | 'black' | 'autopep8' | 'yapf';

export type ImportSorter = 'ruff' | 'isort';

export type TypeChecker = 'basedpyright' | 'pyright' | 'mypy' | 'pytype';

export type CISystem = 'github-actions' | 'gitlab-ci' | 'travis-ci' | 'circleci' | 'azure-pipelines';

/**
 * Everything the detectors found in one pass over a project
 */
export interface ToolingSnapshot {
  packageManager: DetectionResult<PackageManager>;
  linter: DetectionResult<Linter>;
  formatter: DetectionResult<Formatter>;
  importSorter: DetectionResult<ImportSorter>;
  typeChecker: DetectionResult<TypeChecker>;
  preCommit: boolean;
  ci: DetectionResult<CISystem>;
}

/**
 * Type annotation coverage over all function definitions
 */
export interface TypeCoverage {
  /** annotated / total * 100, or 100 when there are no functions */
  percentage: number;
  annotated: number;
  total: number;
}

// ============================================================================
// Audit
// ============================================================================

export type RecommendationCategory =
  | 'tooling'
  | 'configuration'
  | 'dependencies'
  | 'security'
  | 'code_quality';

export type Severity = 'info' | 'warning' | 'error' | 'critical';

/**
 * A single audit finding
 */
export interface Recommendation {
  readonly category: RecommendationCategory;
  readonly message: string;
  readonly severity: Severity;
  /** File this recommendation relates to, if any */
  readonly filePath?: string;
  /** Command or step that addresses it */
  readonly action?: string;
}

/**
 * Result of auditing a project
 */
export interface AuditResult {
  /** Absolute path of the audited project */
  projectPath: string;
  /** Recommendations in generation order (callers sort for display) */
  recommendations: Recommendation[];
  /** Health score (0-100) */
  score: number;
  /** Detected category -> tool */
  toolingDetected: Record<string, string>;
}

// ============================================================================
// Migration
// ============================================================================

/**
 * Legacy package managers that can be migrated to uv
 */
export type SourceTool = 'poetry' | 'pip' | 'pipenv' | 'setuptools';

export type MigrationType = 'package_manager' | 'formatter' | 'import_sorter' | 'linter' | 'type_checker';

interface MigrationStepBase {
  /** Human-readable description */
  description: string;
  /** Absolute paths of the files the step may rewrite or delete */
  filesAffected: string[];
  /** False when the step destroys something a backup cannot restore faithfully */
  reversible: boolean;
}

/**
 * One category-scoped configuration rewrite within an upgrade plan
 */
export type MigrationStep =
  | (MigrationStepBase & { type: 'package_manager'; source: SourceTool; target: 'uv' })
  | (MigrationStepBase & { type: 'formatter'; source: 'black'; target: 'ruff' })
  | (MigrationStepBase & { type: 'import_sorter'; source: 'isort'; target: 'ruff' })
  | (MigrationStepBase & { type: 'linter'; source: 'flake8'; target: 'ruff' })
  | (MigrationStepBase & { type: 'type_checker'; source: 'mypy'; target: 'basedpyright' });

/**
 * Options for upgrading a project
 */
export interface UpgradeOptions {
  /** Source package manager; auto-detected when omitted */
  fromTool?: string;
  /** Report changes without touching the filesystem */
  dryRun?: boolean;
  /** Copy config files to a backup directory first (ignored on dry runs) */
  backup?: boolean;
  logger?: Logger;
}

/**
 * Result of upgrading a project
 */
export interface UpgradeResult {
  /** True iff no errors were recorded */
  success: boolean;
  projectPath: string;
  /** Ordered log of changes */
  changesMade: string[];
  /** Backup directory, when one was created */
  backupPath?: string;
  /** Ordered list of errors; later steps still run after one fails */
  errors: string[];
  /** Steps that were attempted */
  migrationSteps: MigrationStep[];
}

// ============================================================================
// Output
// ============================================================================

/**
 * Logger interface for consistent output
 */
export interface Logger {
  info: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
  log: (message: string) => void;
}
