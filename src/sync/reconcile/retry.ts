export interface RetryPolicy {
  /** Total attempts including the first call. */
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  factor: 2,
  maxDelayMs: 8_000,
};

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  /** Uniform [0, 1), injectable for deterministic tests. */
  random?: () => number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempt(s)`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Full-jitter exponential backoff: uniform in [0, min(max, base * factor^(attempt-1))]. */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.factor ** (attempt - 1));
  return Math.round(ceiling * random());
}

/**
 * Transient failures worth another attempt: rate limits, server errors and
 * network errors that never produced an HTTP status.
 */
export function isTransientError(error: unknown): boolean {
  const status = httpStatusOf(error);
  if (status === undefined) return true;
  if (status === 429 || status >= 500) return true;
  if (status === 403) {
    return reasonsOf(error).some((r) => r === "rateLimitExceeded" || r === "userRateLimitExceeded");
  }
  return false;
}

/**
 * Run `operation` until it succeeds or the policy's attempt budget is spent.
 * Non-retryable errors are rethrown wrapped after the attempt that raised them.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<{ value: T; attempts: number }> {
  const sleep = hooks.sleep ?? delay;
  const random = hooks.random ?? Math.random;
  const isRetryable = hooks.isRetryable ?? isTransientError;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await operation(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delayMs = backoffDelay(policy, attempt, random);
      hooks.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("code" in error && typeof error.code === "number") return error.code;
  if ("response" in error && typeof error.response === "object" && error.response !== null) {
    const response = error.response;
    if ("status" in response && typeof response.status === "number") return response.status;
  }
  return undefined;
}

/** `errors[].reason` as Google's API error bodies report them. */
function reasonsOf(error: unknown): string[] {
  if (typeof error !== "object" || error === null || !("errors" in error)) return [];
  const list: unknown = error.errors;
  if (!Array.isArray(list)) return [];
  const entries: unknown[] = list;
  const reasons: string[] = [];
  for (const entry of entries) {
    if (typeof entry === "object" && entry !== null && "reason" in entry && typeof entry.reason === "string") {
      reasons.push(entry.reason);
    }
  }
  return reasons;
}
