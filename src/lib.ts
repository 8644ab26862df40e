export type * from './types/index.js';

export { auditProject, validateProjectRoot } from './analyzers/audit.js';
export {
  detectFormatter,
  detectImportSorter,
  detectLinter,
  detectPackageManager,
  detectPreCommit,
  detectTooling,
  detectTypeChecker,
} from './analyzers/tooling.js';
export { detectCI } from './analyzers/ci.js';
export { analyzeTypeCoverage } from './analyzers/type-coverage.js';
export {
  calculateScore,
  countBySeverity,
  generateCodeQualityRecommendations,
  generateToolingRecommendations,
  isModernToolchain,
  sortBySeverity,
} from './analyzers/recommendations.js';

export { createMigrationPlan, detectSourceTool } from './strategies/plan.js';
export { upgradeProject, executorFor } from './strategies/upgrade.js';
export { createBackup } from './strategies/backup.js';
export { PyprojectDocument } from './strategies/pyproject-document.js';
export type { MigrationContext, MigrationExecutor } from './strategies/context.js';

export {
  ProjectConfigSchema,
  enabledFeatures,
  loadProjectConfig,
  packageName,
  parseProjectConfig,
  projectDir,
  requiresPython,
  srcPath,
  testPath,
} from './config/project-config.js';
export type { ProjectConfig, ProjectConfigInput } from './config/project-config.js';

export { ActionableError, InvalidProjectPathError, MigrationError } from './utils/errors.js';
export { createLogger, createSilentLogger } from './utils/logger.js';
