/**
 * Reconciliation Error Types
 */

export type ReconcileErrorCode =
  | 'MALFORMED_INPUT'
  | 'INVALID_OPTIONS'
  | 'RECONCILIATION_ERROR';

export interface ReconcileErrorDetails {
  code: ReconcileErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ReconcileErrorDetails) {
    super(details.message);
    this.name = 'ReconcileError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for terminal output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

export interface MalformedInputErrorDetails {
  /** Input file (or other source name) that failed to load */
  source: string;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

/**
 * An input file is missing, unreadable or structurally wrong. Fatal: nothing
 * is matched or written.
 */
export class MalformedInputError extends ReconcileError {
  readonly source: string;

  constructor(details: MalformedInputErrorDetails) {
    super({
      code: 'MALFORMED_INPUT',
      message: `${details.source}: ${details.message}`,
      suggestion: details.suggestion,
      cause: details.cause,
      context: { ...details.context, source: details.source },
    });
    this.name = 'MalformedInputError';
    this.source = details.source;
  }
}
