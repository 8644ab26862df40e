import { describe, it, expect, afterEach } from 'vitest';
import path from 'node:path';
import { createMigrationPlan, detectSourceTool, isSourceTool } from '../../../src/strategies/plan.js';
import { createTempFixture, cleanupFixtures, fixtureConfigs } from '../../helpers/fixtures.js';
import { createMockLogger } from '../../helpers/mocks.js';
import { InvalidProjectPathError } from '../../../src/utils/errors.js';

describe('Migration planning', () => {
  afterEach(async () => {
    await cleanupFixtures();
  });

  describe('createMigrationPlan', () => {
    it('should reject a project path that does not exist', async () => {
      const root = await createTempFixture({ name: 'plan' });
      const missing = path.join(root, 'missing');

      await expect(createMigrationPlan(missing)).rejects.toBeInstanceOf(InvalidProjectPathError);
      await expect(createMigrationPlan(missing)).rejects.toMatchObject({ reason: 'missing' });
    });

    it('should reject a project path that is a file', async () => {
      const root = await createTempFixture({ name: 'plan', files: { 'setup.py': '' } });

      await expect(createMigrationPlan(path.join(root, 'setup.py'))).rejects.toMatchObject({
        reason: 'not-a-directory',
      });
    });

    it('should still read pyproject.toml holding an integer past the safe range', async () => {
      const root = await createTempFixture({
        name: 'plan',
        files: {
          'pyproject.toml': '[tool.other]\nseed = 9007199254740993\n\n[tool.black]\nline-length = 100\n',
        },
      });

      const steps = await createMigrationPlan(root);

      expect(steps.map((step) => step.type)).toEqual(['formatter']);
    });

    it('should plan nothing for a modern project', async () => {
      const root = await createTempFixture(fixtureConfigs.modern());

      expect(await createMigrationPlan(root)).toEqual([]);
    });

    it('should order steps package manager, formatter, import sorter, linter, type checker', async () => {
      const config = fixtureConfigs.poetry();
      const root = await createTempFixture({ ...config, files: { ...config.files, '.flake8': '[flake8]\n' } });

      const steps = await createMigrationPlan(root);

      expect(steps.map((s) => `${s.type}:${s.source}->${s.target}`)).toEqual([
        'package_manager:poetry->uv',
        'formatter:black->ruff',
        'import_sorter:isort->ruff',
        'linter:flake8->ruff',
        'type_checker:mypy->basedpyright',
      ]);
      expect(steps[0]).toEqual({
        type: 'package_manager',
        source: 'poetry',
        target: 'uv',
        description: 'Convert Poetry pyproject.toml to PEP 621 format for uv',
        filesAffected: [path.join(root, 'pyproject.toml'), path.join(root, 'poetry.lock')],
        reversible: false,
      });
      expect(steps.slice(1).every((s) => s.reversible)).toBe(true);
    });

    it('should use the given source tool over detection', async () => {
      const root = await createTempFixture(fixtureConfigs.pip());

      const steps = await createMigrationPlan(root, 'pipenv');

      expect(steps[0]).toMatchObject({ type: 'package_manager', source: 'pipenv' });
      expect(steps[0].description).toBe('Convert Pipfile to pyproject.toml for uv');
    });

    it('should skip the package manager step for an unknown source tool', async () => {
      const root = await createTempFixture(fixtureConfigs.pip());
      const logger = createMockLogger();

      const steps = await createMigrationPlan(root, 'conda', logger);

      expect(steps.map((s) => s.type)).toEqual(['linter']);
      expect(logger.warn).toHaveBeenCalledWith('Unknown source tool "conda", skipping package manager migration');
    });

    it('should not plan a package manager step for uv or pdm', async () => {
      const root = await createTempFixture({ name: 'pdm', files: { 'pyproject.toml': '[tool.pdm]\n[tool.black]\n' } });

      expect((await createMigrationPlan(root)).map((s) => s.type)).toEqual(['formatter']);
    });
  });

  describe('detectSourceTool', () => {
    it('should map legacy managers and ignore modern ones', async () => {
      const pip = await createTempFixture(fixtureConfigs.pip());
      const modern = await createTempFixture(fixtureConfigs.modern());

      expect(await detectSourceTool(pip)).toBe('pip');
      expect(await detectSourceTool(modern)).toBeNull();
    });
  });

  describe('isSourceTool', () => {
    it('should accept only migratable managers', () => {
      expect(isSourceTool('setuptools')).toBe(true);
      expect(isSourceTool('uv')).toBe(false);
    });
  });
});
