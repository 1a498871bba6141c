// Global error types

/** HTTP status an error maps to on the control API */
export type ErrorStatus = 400 | 404 | 500;

export class AppLockError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: ErrorStatus = 500
  ) {
    super(message);
    this.name = 'AppLockError';
  }
}

export class NotFoundError extends AppLockError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppLockError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends AppLockError {
  constructor(configPath: string, reason: string) {
    super(`Invalid config at ${configPath}: ${reason}`, 'CONFIG_ERROR', 500);
    this.name = 'ConfigError';
  }
}

/** Narrow an unknown thrown value to a Node errno error. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
