/**
 * An error with an actionable hint for the user.
 */
export class ActionableError extends Error {
  hint: string;

  constructor(message: string, hint: string) {
    super(message);
    this.name = 'ActionableError';
    this.hint = hint;
  }
}

/**
 * The project root handed to audit/plan/upgrade is unusable.
 */
export class InvalidProjectPathError extends ActionableError {
  readonly reason: 'missing' | 'not-a-directory';

  constructor(projectPath: string, reason: 'missing' | 'not-a-directory') {
    super(
      reason === 'missing'
        ? `Path does not exist: ${projectPath}`
        : `Path is not a directory: ${projectPath}`,
      'Pass the root directory of a Python project'
    );
    this.name = 'InvalidProjectPathError';
    this.reason = reason;
  }
}

/**
 * A migration step could not rewrite its configuration.
 * Recorded on the upgrade result; remaining steps still run.
 */
export class MigrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MigrationError';
  }
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Shape any error into an ActionableError with a helpful hint.
 */
export function shapeError(err: unknown): ActionableError {
  if (err instanceof ActionableError) return err;

  const message = errorMessage(err);

  // Pattern match common errors to provide hints
  if (message.includes('ENOENT')) {
    return new ActionableError(message, 'Check that the file or directory exists');
  }
  if (message.includes('EACCES') || message.includes('EPERM')) {
    return new ActionableError(
      message,
      'Check file permissions or try running with elevated privileges'
    );
  }
  if (message.includes('tree-sitter')) {
    return new ActionableError(
      message,
      'Reinstall dependencies so the tree-sitter native modules are rebuilt'
    );
  }
  if (message.includes('ENOSPC')) {
    return new ActionableError(
      message,
      'Insufficient disk space. Free up space and try again'
    );
  }

  return new ActionableError(message, 'Check the error details above and try again');
}
