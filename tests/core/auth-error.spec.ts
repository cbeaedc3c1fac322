import { describe, expect, it } from "vitest";
import {
  AuthError,
  accountLockedError,
  defaultStatusForCode,
  invalidCredentialsError,
  isAuthError,
  isTransientError,
  rateLimitedError,
  toRetryAfterSeconds,
  transientError,
  withTransientRetry,
} from "../../src/core/auth-error.js";

describe("core/auth-error", () => {
  it("creates an AuthError with code + default status", () => {
    const err = new AuthError("invalid_input", "bad");
    expect(err.code).toBe("invalid_input");
    expect(err.status).toBe(400);
    expect(err.name).toBe("AuthError");
    expect(isAuthError(err)).toBe(true);
    expect(isAuthError(new Error("bad"))).toBe(false);
  });

  it("maps defaultStatusForCode correctly for a few key codes", () => {
    expect(defaultStatusForCode("unauthorized")).toBe(401);
    expect(defaultStatusForCode("rate_limited")).toBe(429);
    expect(defaultStatusForCode("account_locked")).toBe(423);
    expect(defaultStatusForCode("challenge_attempts_exhausted")).toBe(429);
    expect(defaultStatusForCode("challenge_not_found")).toBe(404);
    expect(defaultStatusForCode("transient_dependency")).toBe(503);
    expect(defaultStatusForCode("configuration")).toBe(500);
  });

  it("rounds retry-after up to whole seconds, at least one", () => {
    expect(toRetryAfterSeconds(1)).toBe(1);
    expect(toRetryAfterSeconds(1000)).toBe(1);
    expect(toRetryAfterSeconds(1001)).toBe(2);
    expect(toRetryAfterSeconds(0)).toBe(1);
  });

  it("rate limit and lockout errors carry retryAfterMs and a public message with seconds", () => {
    const limited = rateLimitedError(30 * 60 * 1000);
    expect(limited.code).toBe("rate_limited");
    expect(limited.status).toBe(429);
    expect(limited.retryAfterMs).toBe(1_800_000);
    expect(limited.publicMessage).toBe("Too many attempts. Try again in 1800 seconds.");

    const locked = accountLockedError(90_500);
    expect(locked.code).toBe("account_locked");
    expect(locked.retryAfterMs).toBe(90_500);
    expect(locked.publicMessage).toBe(
      "Account is temporarily locked due to too many failed attempts. Try again in 91 seconds.",
    );
  });

  it("uses one generic public message for credential failures", () => {
    const err = invalidCredentialsError();
    expect(err.code).toBe("unauthorized");
    expect(err.publicMessage).toBe("Invalid email or password");
  });

  it("wraps driver failures as transient but passes AuthErrors through", () => {
    const cause = new Error("connection reset");
    const wrapped = transientError("storage.x failed", cause);
    expect(wrapped.code).toBe("transient_dependency");
    expect(wrapped.cause).toBe(cause);
    expect(isTransientError(wrapped)).toBe(true);

    const original = new AuthError("invalid_input", "bad");
    expect(transientError("storage.x failed", original)).toBe(original);
  });

  it("retries transient failures a bounded number of times", async () => {
    let calls = 0;
    const result = await withTransientRetry(
      async () => {
        calls++;
        if (calls < 3) throw transientError("flaky", new Error("timeout"));
        return "ok";
      },
      { attempts: 3, delayMs: 0 },
    );
    expect(result).toBe("ok");
    expect(calls).toBe(3);
  });

  it("gives up after the last attempt and rethrows the transient error", async () => {
    let calls = 0;
    await expect(
      withTransientRetry(
        async () => {
          calls++;
          throw transientError("down", new Error("refused"));
        },
        { attempts: 2, delayMs: 0 },
      ),
    ).rejects.toMatchObject({ code: "transient_dependency", message: "down" });
    expect(calls).toBe(2);
  });

  it("does not retry other errors", async () => {
    let calls = 0;
    await expect(
      withTransientRetry(
        async () => {
          calls++;
          throw new AuthError("unauthorized", "nope");
        },
        { attempts: 5, delayMs: 0 },
      ),
    ).rejects.toMatchObject({ code: "unauthorized" });
    expect(calls).toBe(1);
  });
});
