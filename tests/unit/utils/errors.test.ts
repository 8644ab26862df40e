import { describe, it, expect } from 'vitest';
import {
  ActionableError,
  errorMessage,
  InvalidProjectPathError,
  MigrationError,
  shapeError,
} from '../../../src/utils/errors.js';

describe('errors', () => {
  it('should build path errors with a reason', () => {
    const missing = new InvalidProjectPathError('/tmp/none', 'missing');
    const file = new InvalidProjectPathError('/tmp/file', 'not-a-directory');

    expect(missing).toBeInstanceOf(ActionableError);
    expect(missing.message).toBe('Path does not exist: /tmp/none');
    expect(file.message).toBe('Path is not a directory: /tmp/file');
    expect(file.hint).toBe('Pass the root directory of a Python project');
  });

  it('should extract messages from anything thrown', () => {
    expect(errorMessage(new MigrationError('bad'))).toBe('bad');
    expect(errorMessage('plain')).toBe('plain');
  });

  describe('shapeError', () => {
    it('should pass actionable errors through', () => {
      const error = new ActionableError('x', 'y');

      expect(shapeError(error)).toBe(error);
    });

    it.each([
      ['ENOENT: no such file', 'Check that the file or directory exists'],
      ['EACCES: permission denied', 'Check file permissions or try running with elevated privileges'],
      ["Cannot find module 'tree-sitter'", 'Reinstall dependencies so the tree-sitter native modules are rebuilt'],
      ['ENOSPC: no space left', 'Insufficient disk space. Free up space and try again'],
      ['something else', 'Check the error details above and try again'],
    ])('should hint for %s', (message, hint) => {
      const shaped = shapeError(new Error(message));

      expect(shaped.message).toBe(message);
      expect(shaped.hint).toBe(hint);
    });
  });
});
