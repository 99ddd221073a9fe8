/**
 * Custom error types for connectors
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'NOT_CONNECTED'
  | 'READ_FAILED'
  | 'PARSE_FAILED'
  | 'SCHEMA_MISMATCH'
  | 'WRITE_FAILED'
  | 'UNSUPPORTED_OPERATION'
  | 'CONFIGURATION_ERROR';

export interface ConnectorErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Connector ID that raised the error */
  connectorId?: string;
  /** File the connector was reading or writing */
  filePath?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class ConnectorError extends Error {
  readonly code: ErrorCode;
  readonly connectorId?: string;
  readonly filePath?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ConnectorErrorDetails) {
    super(details.message);
    this.name = 'ConnectorError';
    this.code = details.code;
    this.connectorId = details.connectorId;
    this.filePath = details.filePath;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace?.(this, ConnectorError);
  }

  /**
   * Format error for the command line
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.filePath) {
      parts.push(`File: ${this.filePath}`);
    }

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
      connectorId: this.connectorId,
      filePath: this.filePath,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
