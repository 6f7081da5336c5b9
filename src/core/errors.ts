import { maskSensitiveData } from '../utils/security';

export class DashboardError extends Error {
    constructor(
      message: string,
      public code: string,
      public statusCode: number = 500,
      public details?: Record<string, unknown>
    ) {
      super(message);
      this.name = 'DashboardError';
      Error.captureStackTrace(this, this.constructor);
    }
  }

  export class LoadError extends DashboardError {
    constructor(public source: string, public cause: string) {
      super(
        `Failed to load ${maskSensitiveData(source)}: ${cause}`,
        'LOAD_ERROR',
        502,
        { source: maskSensitiveData(source), cause }
      );
      this.name = 'LoadError';
    }
  }

  export class MissingColumnError extends DashboardError {
    constructor(public columns: string[], context: string) {
      super(
        `${context}: expected one of ${columns.map(c => `"${c}"`).join(', ')}`,
        'MISSING_COLUMN',
        422,
        { columns, context }
      );
      this.name = 'MissingColumnError';
    }
  }

  export class JoinKeyMissing extends DashboardError {
    constructor(public key: string, public table: string) {
      super(`Join key "${key}" is missing from the ${table} table`, 'JOIN_KEY_MISSING', 422, { key, table });
      this.name = 'JoinKeyMissing';
    }
  }

  export class NoJoinKey extends DashboardError {
    constructor(public aliases: readonly string[]) {
      super(
        `Could not find any of these join keys in the contacts table: ${aliases.join(', ')}`,
        'NO_JOIN_KEY',
        422,
        { aliases: [...aliases] }
      );
      this.name = 'NoJoinKey';
    }
  }

  export class ValidationError extends DashboardError {
    constructor(message: string = 'Validation failed', details?: Record<string, unknown>) {
      super(message, 'VALIDATION_ERROR', 400, details);
      this.name = 'ValidationError';
    }
  }

  /**
   * Errors that only disable the view that raised them.
   */
  export function isViewScopedError(error: unknown): error is MissingColumnError | JoinKeyMissing | NoJoinKey {
    return error instanceof MissingColumnError || error instanceof JoinKeyMissing || error instanceof NoJoinKey;
  }
