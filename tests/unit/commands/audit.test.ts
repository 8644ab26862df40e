import { describe, it, expect, vi, afterEach } from 'vitest';
import path from 'node:path';
import { auditCommand, printAuditReport } from '../../../src/commands/audit.js';
import { createTempFixture, cleanupFixtures, fixtureConfigs } from '../../helpers/fixtures.js';
import { createMockLogger } from '../../helpers/mocks.js';

describe('audit command', () => {
  afterEach(async () => {
    await cleanupFixtures();
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('should print the audit result as JSON', async () => {
    const root = await createTempFixture(fixtureConfigs.poetry());
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await auditCommand(root, { json: true });

    expect(log).toHaveBeenCalledTimes(1);
    const output = JSON.parse(String(log.mock.calls[0][0]));
    expect(output.projectPath).toBe(root);
    expect(output.score).toBe(89);
    expect(output.recommendations).toHaveLength(7);
  });

  it('should report an invalid path as JSON and set the exit code', async () => {
    const root = await createTempFixture({ name: 'audit-cmd' });
    const missing = path.join(root, 'missing');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await auditCommand(missing, { json: true });

    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      error: `Path does not exist: ${missing}`,
      hint: 'Pass the root directory of a Python project',
    });
    expect(process.exitCode).toBe(1);
  });

  it('should list recommendations in the report', async () => {
    const logger = createMockLogger();

    printAuditReport(
      {
        projectPath: '/work/demo',
        score: 94,
        toolingDetected: { package_manager: 'poetry' },
        recommendations: [
          { category: 'tooling', message: 'Consider pre-commit', severity: 'info' },
          { category: 'tooling', message: 'Add a linter', severity: 'warning', action: 'Add ruff' },
        ],
      },
      logger
    );

    const lines = vi.mocked(logger.log).mock.calls.map(([line]) => line);
    const linter = lines.findIndex((line) => line.includes('Add a linter'));
    const preCommit = lines.findIndex((line) => line.includes('Consider pre-commit'));
    expect(linter).toBeGreaterThan(-1);
    expect(linter).toBeLessThan(preCommit);
    expect(lines[linter + 1]).toContain('Add ruff');
  });

  it('should congratulate a modern project', () => {
    const logger = createMockLogger();

    printAuditReport(
      { projectPath: '/work/demo', score: 100, toolingDetected: { status: 'modern' }, recommendations: [] },
      logger
    );

    expect(logger.success).toHaveBeenCalledWith('Project already uses modern tooling');
  });
});
