export type AuthErrorCode =
  | "invalid_input"
  | "unauthorized"
  | "forbidden"
  | "rate_limited"
  | "account_locked"
  | "conflict"
  | "not_found"
  | "configuration"
  | "transient_dependency"
  | "internal_error"
  // Second-factor challenge outcomes
  | "challenge_not_found"
  | "challenge_invalid"
  | "challenge_expired"
  | "challenge_consumed"
  | "challenge_attempts_exhausted";

export type AuthErrorOptions = {
  cause?: unknown;
  /**
   * Safe-to-expose message intended for UI/clients.
   * Prefer generic messages to avoid user enumeration.
   */
  publicMessage?: string;
  /**
   * Optional HTTP-ish status mapping for adapters.
   */
  status?: number;
  /**
   * Set for `rate_limited` and `account_locked`.
   */
  retryAfterMs?: number;
  /**
   * Set for `challenge_invalid`.
   */
  remainingAttempts?: number;
};

export class AuthError extends Error {
  public readonly code: AuthErrorCode;
  public readonly publicMessage?: string;
  public readonly status: number;
  public readonly retryAfterMs?: number;
  public readonly remainingAttempts?: number;

  constructor(code: AuthErrorCode, message: string, options: AuthErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "AuthError";
    this.code = code;
    this.publicMessage = options.publicMessage;
    this.status = options.status ?? defaultStatusForCode(code);
    this.retryAfterMs = options.retryAfterMs;
    this.remainingAttempts = options.remainingAttempts;
  }
}

export function isAuthError(err: unknown): err is AuthError {
  return err instanceof AuthError;
}

export function isTransientError(err: unknown): boolean {
  return isAuthError(err) && err.code === "transient_dependency";
}

export function defaultStatusForCode(code: AuthErrorCode): number {
  switch (code) {
    case "invalid_input":
      return 400;
    case "unauthorized":
    case "challenge_invalid":
    case "challenge_expired":
    case "challenge_consumed":
      return 401;
    case "forbidden":
      return 403;
    case "not_found":
    case "challenge_not_found":
      return 404;
    case "conflict":
      return 409;
    case "account_locked":
      return 423;
    case "rate_limited":
    case "challenge_attempts_exhausted":
      return 429;
    case "transient_dependency":
      return 503;
    case "configuration":
    case "internal_error":
    default:
      return 500;
  }
}

export function toRetryAfterSeconds(retryAfterMs: number): number {
  return Math.max(1, Math.ceil(retryAfterMs / 1000));
}

export function rateLimitedError(retryAfterMs: number): AuthError {
  const seconds = toRetryAfterSeconds(retryAfterMs);
  return new AuthError("rate_limited", "Too many attempts", {
    retryAfterMs,
    publicMessage: `Too many attempts. Try again in ${seconds} seconds.`,
  });
}

export function accountLockedError(retryAfterMs: number): AuthError {
  const seconds = toRetryAfterSeconds(retryAfterMs);
  return new AuthError("account_locked", "Account is temporarily locked", {
    retryAfterMs,
    publicMessage: `Account is temporarily locked due to too many failed attempts. Try again in ${seconds} seconds.`,
  });
}

export function invalidCredentialsError(): AuthError {
  // Same message for unknown accounts, inactive accounts and wrong passwords.
  return new AuthError("unauthorized", "Invalid credentials", {
    publicMessage: "Invalid email or password",
  });
}

/**
 * Wrap a store or gateway failure. The cause is kept for internal logs only.
 */
export function transientError(message: string, cause: unknown): AuthError {
  if (isAuthError(cause)) return cause;
  return new AuthError("transient_dependency", message, {
    cause,
    publicMessage: "Service temporarily unavailable. Please try again.",
  });
}

export type TransientRetryOptions = {
  /**
   * Total attempts including the first one.
   */
  attempts?: number;
  delayMs?: number;
};

/**
 * Retry `fn` while it fails with `transient_dependency`, up to a fixed number of attempts.
 * Other errors propagate immediately.
 */
export async function withTransientRetry<T>(
  fn: () => Promise<T>,
  options: TransientRetryOptions = {},
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts ?? 3));
  const delayMs = Math.max(0, options.delayMs ?? 50);
  let lastError: unknown;
  for (let i = 0; i < attempts; i++) {
    try {
      return await fn();
    } catch (err) {
      if (!isTransientError(err)) throw err;
      lastError = err;
      if (i < attempts - 1 && delayMs > 0) {
        await new Promise<void>(resolve => setTimeout(resolve, delayMs * (i + 1)));
      }
    }
  }
  throw lastError;
}
