/**
 * Component errors and their process exit codes.
 *
 * Exit code 1 means the user can fix the problem in their configuration;
 * exit code 2 covers everything else.
 */

export const EXIT_USER_ERROR = 1;
export const EXIT_APPLICATION_ERROR = 2;

/**
 * A configuration problem the user can correct.
 */
export class UserError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UserError';
  }
}

/**
 * A shipped schema document that cannot be read or is not well-formed.
 */
export class SchemaDocumentError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly problems: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SchemaDocumentError';
  }
}

export function getExitCode(error: unknown): number {
  return error instanceof UserError ? EXIT_USER_ERROR : EXIT_APPLICATION_ERROR;
}

/**
 * Best-effort message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
