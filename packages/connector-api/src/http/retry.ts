import { ConnectorError, sleep } from '@catalogsync/core';

/**
 * Retry behaviour of the HTTP layer. The delay before attempt n (n >= 2) is
 * `delayMs * backoff^(n - 2)`, so a backoff of 1 keeps it constant.
 */
export interface RetryPolicy {
  /** Total attempts including the first */
  maxAttempts: number;
  delayMs: number;
  backoff: number;
  isRetryable: (err: unknown) => boolean;
}

export type RetryContext = {
  attempt: number;
  attempts: number;
  delayMs?: number;
};

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  // TLS
  'EPROTO',
  'ERR_SSL_WRONG_VERSION_NUMBER',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'CERT_HAS_EXPIRED',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  // proxies
  'UND_ERR_PROXY',
  'ERR_PROXY_CONNECTION_FAILED',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Connection resets, TLS and proxy failures, timeouts and any non-2xx response.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof ConnectorError) return err.transient;

  const code = errorCode(err);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const cause = err instanceof Error ? err.cause : undefined;
  const causeCode = errorCode(cause);
  return causeCode !== undefined && TRANSIENT_ERROR_CODES.has(causeCode);
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  delayMs: 5_000,
  backoff: 1,
  isRetryable: isTransientError,
};

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  return {
    ...policy,
    maxAttempts: Math.max(1, Math.floor(policy.maxAttempts)),
    delayMs: Math.max(0, policy.delayMs),
    backoff: Math.max(1, policy.backoff),
  };
}

export function retryDelayMs(policy: RetryPolicy, attempt: number): number {
  if (attempt <= 1) return 0;
  return Math.round(policy.delayMs * policy.backoff ** (attempt - 2));
}

export async function withRetries<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  onRetry?: (err: unknown, next: RetryContext) => void
): Promise<T> {
  const attempts = policy.maxAttempts;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    const delayMs = retryDelayMs(policy, attempt);
    await sleep(delayMs);

    try {
      return await fn({ attempt, attempts, delayMs: delayMs > 0 ? delayMs : undefined });
    } catch (err) {
      lastError = err;
      if (attempt >= attempts || !policy.isRetryable(err)) {
        throw err;
      }
      onRetry?.(err, { attempt: attempt + 1, attempts, delayMs: retryDelayMs(policy, attempt + 1) });
    }
  }

  // Should be unreachable.
  throw lastError;
}
