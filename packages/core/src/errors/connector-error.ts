/**
 * Errors raised while talking to the catalog or the directory
 */

export type ErrorCode =
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'PERMISSION_DENIED'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'HTTP_ERROR'
  | 'WRITE_FAILED'
  | 'READ_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN';

/** Codes the HTTP layer may retry */
export const TRANSIENT_ERROR_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>(['CONNECTION_FAILED', 'TIMEOUT']);

export interface ConnectorErrorDetails {
  code: ErrorCode;
  message: string;
  /** Service that raised the error ("catalog", "directory", ...) */
  source?: string;
  /** Suggested action; defaults per source and code when omitted */
  suggestion?: string;
  cause?: Error;
  /** Request facts such as method, url and status */
  context?: Record<string, unknown>;
}

const SUGGESTIONS: Record<string, Partial<Record<ErrorCode, string>>> = {
  catalog: {
    AUTHENTICATION_FAILED: 'Check catalog.auth in the configuration.',
    PERMISSION_DENIED: 'Grant the service account write access to the affected scheme.',
    RATE_LIMITED: 'Increase http.rateLimitDelayMs.',
    CONNECTION_FAILED: 'Check catalog.baseUrl and network connectivity.',
  },
  'catalog-auth': {
    AUTHENTICATION_FAILED: 'Check catalog.auth.tokenUrl and the client credentials.',
  },
  directory: {
    AUTHENTICATION_FAILED: 'Check directory.accessKey.',
    RATE_LIMITED: 'Increase run.interCallDelayMs or http.rateLimitDelayMs.',
    CONNECTION_FAILED: 'Check directory.baseUrl and network connectivity.',
  },
};

export function defaultSuggestion(code: ErrorCode, source?: string): string | undefined {
  return source ? SUGGESTIONS[source]?.[code] : undefined;
}

function describeRequest(context: Record<string, unknown> | undefined): string | undefined {
  if (!context) return undefined;
  const { method, url, status } = context;
  if (typeof method !== 'string' || typeof url !== 'string') return undefined;
  return typeof status === 'number' ? `${method} ${url} (${status})` : `${method} ${url}`;
}

export class ConnectorError extends Error {
  readonly code: ErrorCode;
  readonly source?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ConnectorErrorDetails) {
    super(details.message);
    this.name = 'ConnectorError';
    this.code = details.code;
    this.source = details.source;
    this.suggestion = details.suggestion ?? defaultSuggestion(details.code, details.source);
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    if ('captureStackTrace' in Error) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Worth another attempt: a timeout or a dropped connection */
  get transient(): boolean {
    return TRANSIENT_ERROR_CODES.has(this.code);
  }

  /**
   * One line per fact, for logs and run reports
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.source) {
      parts.push(`Source: ${this.source}`);
    }

    const request = describeRequest(this.context);
    if (request) {
      parts.push(`Request: ${request}`);
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
      source: this.source,
      suggestion: this.suggestion,
      transient: this.transient,
      context: this.context,
    };
  }
}

export function wrapError(
  error: unknown,
  source?: string,
  defaultCode: ErrorCode = 'UNKNOWN'
): ConnectorError {
  if (error instanceof ConnectorError) {
    return error;
  }

  return new ConnectorError({
    code: defaultCode,
    message: errorMessage(error),
    source,
    cause: error instanceof Error ? error : undefined,
  });
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
