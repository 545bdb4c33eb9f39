/**
 * Failure raised while loading templates, reading input or mapping one
 * connector. Inside a batch the orchestrator turns it into that
 * connector's TemplateNotFound or InternalError issue.
 */

export type TranslationErrorCode =
  | 'TEMPLATE_NOT_FOUND'
  | 'INVALID_TEMPLATE'
  | 'INVALID_INPUT'
  | 'CONFIGURATION_ERROR'
  | 'SIMILARITY_FAILED'
  | 'UNKNOWN';

export interface TranslationErrorDetails {
  code: TranslationErrorCode;
  message: string;
  /** Connector being translated when the error was raised */
  connectorName?: string;
  /** What the operator can change to get past the error */
  suggestion?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class TranslationError extends Error {
  readonly code: TranslationErrorCode;
  readonly connectorName?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: TranslationErrorDetails) {
    super(details.message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'TranslationError';
    this.code = details.code;
    this.connectorName = details.connectorName;
    this.suggestion = details.suggestion;
    this.context = details.context;
  }

  static is(error: unknown, code?: TranslationErrorCode): error is TranslationError {
    return error instanceof TranslationError && (code === undefined || error.code === code);
  }

  /**
   * A thrown value as a TranslationError. Existing ones pass through,
   * picking up the connector name when they lack one.
   */
  static from(error: unknown, connectorName?: string): TranslationError {
    if (error instanceof TranslationError) {
      if (error.connectorName || !connectorName) return error;
      return new TranslationError({
        code: error.code,
        message: error.message,
        connectorName,
        suggestion: error.suggestion,
        cause: error.cause,
        context: error.context,
      });
    }

    return new TranslationError({
      code: 'UNKNOWN',
      message: error instanceof Error ? error.message : String(error),
      connectorName,
      cause: error,
    });
  }

  /** `CODE (connector 'x'): message`, with the suggestion on a second line */
  describe(): string {
    const scope = this.connectorName ? ` (connector '${this.connectorName}')` : '';
    const head = `${this.code}${scope}: ${this.message}`;
    return this.suggestion ? `${head}\nHint: ${this.suggestion}` : head;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      connectorName: this.connectorName,
      suggestion: this.suggestion,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}
