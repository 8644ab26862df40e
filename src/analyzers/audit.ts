import path from 'node:path';
import type { AuditResult, Logger, Recommendation, ToolingSnapshot } from '../types/index.js';
import { InvalidProjectPathError } from '../utils/errors.js';
import { isDirectory, pathExists } from '../utils/fs.js';
import { detectTooling } from './tooling.js';
import { analyzeTypeCoverage } from './type-coverage.js';
import {
  calculateScore,
  formatPercentage,
  generateCodeQualityRecommendations,
  generateToolingRecommendations,
  isModernToolchain,
} from './recommendations.js';

/**
 * Resolve a project root, rejecting paths that are missing or not directories
 */
export async function validateProjectRoot(projectPath: string): Promise<string> {
  const root = path.resolve(projectPath);
  if (!(await pathExists(root))) {
    throw new InvalidProjectPathError(root, 'missing');
  }
  if (!(await isDirectory(root))) {
    throw new InvalidProjectPathError(root, 'not-a-directory');
  }
  return root;
}

function describeTooling(snapshot: ToolingSnapshot): Record<string, string> {
  const detected: Record<string, string> = {};
  const entries: Array<[string, string | null]> = [
    ['package_manager', snapshot.packageManager.tool],
    ['linter', snapshot.linter.tool],
    ['formatter', snapshot.formatter.tool],
    ['import_sorter', snapshot.importSorter.tool],
    ['type_checker', snapshot.typeChecker.tool],
    ['pre_commit', snapshot.preCommit ? 'configured' : null],
    ['ci', snapshot.ci.tool],
  ];
  for (const [key, value] of entries) {
    if (value) detected[key] = value;
  }
  return detected;
}

/**
 * Audit a Python project for outdated tooling and score its health.
 * Reads the tree only; nothing is written.
 */
export async function auditProject(projectPath: string, logger?: Logger): Promise<AuditResult> {
  const root = await validateProjectRoot(projectPath);
  logger?.debug(`Auditing ${root}`);

  const snapshot = await detectTooling(root, logger);
  const toolingDetected = describeTooling(snapshot);

  const coverage = await analyzeTypeCoverage(root, logger);
  toolingDetected.type_coverage = formatPercentage(coverage.percentage);
  logger?.debug(`Type coverage: ${coverage.annotated}/${coverage.total} functions annotated`);

  let recommendations: Recommendation[] = [];
  if (isModernToolchain(snapshot)) {
    // Modern projects get no recommendations at all, coverage included
    toolingDetected.status = 'modern';
  } else {
    recommendations = [
      ...generateToolingRecommendations(snapshot),
      ...generateCodeQualityRecommendations(coverage),
    ];
  }

  const score = calculateScore(recommendations);
  logger?.debug(`Audit produced ${recommendations.length} recommendations, score ${score}`);

  return { projectPath: root, recommendations, score, toolingDetected };
}
