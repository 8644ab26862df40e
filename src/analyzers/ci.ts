import path from 'node:path';
import type { CISystem, DetectionResult } from '../types/index.js';
import { isDirectory, listFiles } from '../utils/fs.js';
import { createProjectProbe, type ProjectProbe } from './probe.js';
import { fileRule, runRules, type DetectionRule } from './rules.js';

const WORKFLOWS_DIR = path.join('.github', 'workflows');

const CI_SYSTEMS: ReadonlyArray<DetectionRule<CISystem>> = [
  {
    tool: 'github-actions',
    match: async (probe) => {
      if (!(await probe.exists(WORKFLOWS_DIR))) return null;
      const dir = path.join(probe.root, WORKFLOWS_DIR);
      if (!(await isDirectory(dir))) return null;
      const workflows = (await listFiles(dir)).filter((f) => f.endsWith('.yml'));
      return workflows.length > 0 ? { workflows: String(workflows.length) } : null;
    },
  },
  fileRule('gitlab-ci', '.gitlab-ci.yml'),
  fileRule('travis-ci', '.travis.yml'),
  fileRule('circleci', '.circleci/config.yml'),
  fileRule('azure-pipelines', 'azure-pipelines.yml'),
];

/**
 * Detect the CI/CD system a project is configured for
 */
export async function detectCI(
  root: string,
  probe: ProjectProbe = createProjectProbe(root)
): Promise<DetectionResult<CISystem>> {
  return runRules(probe, CI_SYSTEMS);
}
