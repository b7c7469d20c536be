import { ConnectorError, type ErrorCode } from './connector-error.js';
import { apiErrorEnvelopeSchema } from '../validation/schemas.js';

/** Structured rejection body returned by the catalog on non-2xx responses */
export interface ApiErrorEnvelope {
  message: string | null;
  violations: string[];
  errors: string[];
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  method: string;
  url: string;
  envelope: ApiErrorEnvelope | null;
  source?: string;
}

function describeEntry(entry: unknown): string {
  if (typeof entry === 'string') return entry;
  if (typeof entry === 'object' && entry !== null && 'message' in entry) {
    const message = entry.message;
    if (typeof message === 'string') return message;
  }
  return JSON.stringify(entry);
}

/**
 * Parse a response body into the error envelope.
 * @returns null when the body is not JSON or carries none of the envelope fields
 */
export function parseApiErrorEnvelope(body: string): ApiErrorEnvelope | null {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }

  const parsed = apiErrorEnvelopeSchema.safeParse(json);
  if (!parsed.success) return null;

  const { message, violations, errors } = parsed.data;
  if (message === undefined && violations === undefined && errors === undefined) {
    return null;
  }

  return {
    message: message ?? null,
    violations: (violations ?? []).map(describeEntry),
    errors: (errors ?? []).map(describeEntry),
  };
}

export function formatHttpErrorMessage(details: HttpErrorDetails): string {
  const kind = details.status >= 500 ? 'Server Error' : 'Client Error';
  const fallback = `${details.status} ${kind}: ${details.statusText} for url: ${details.url}`;
  const envelope = details.envelope;
  if (!envelope) return fallback;

  let message = envelope.message ?? fallback;
  if (envelope.violations.length > 0) {
    message += ` Violations: ${envelope.violations.join('; ')}`;
  }
  if (envelope.errors.length > 0) {
    message += ` Errors: ${envelope.errors.join('; ')}`;
  }
  return message;
}

function codeForStatus(status: number, envelope: ApiErrorEnvelope | null): ErrorCode {
  if (status === 401) return 'AUTHENTICATION_FAILED';
  if (status === 403) return 'PERMISSION_DENIED';
  if (status === 404 || status === 410) return 'NOT_FOUND';
  if (status === 429) return 'RATE_LIMITED';
  if (status >= 400 && status < 500 && envelope && envelope.violations.length > 0) {
    return 'VALIDATION_ERROR';
  }
  return 'HTTP_ERROR';
}

/**
 * Non-2xx response. Carries the parsed error envelope when the body had one.
 */
export class HttpError extends ConnectorError {
  readonly status: number;
  readonly method: string;
  readonly url: string;
  readonly envelope: ApiErrorEnvelope | null;

  constructor(details: HttpErrorDetails) {
    super({
      code: codeForStatus(details.status, details.envelope),
      message: formatHttpErrorMessage(details),
      source: details.source,
      context: {
        status: details.status,
        method: details.method,
        url: details.url,
      },
    });
    this.name = 'HttpError';
    this.status = details.status;
    this.method = details.method;
    this.url = details.url;
    this.envelope = details.envelope;
  }

  /** Any non-2xx answer may be retried; callers mark expected statuses silent */
  override get transient(): boolean {
    return true;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), status: this.status, envelope: this.envelope };
  }
}
