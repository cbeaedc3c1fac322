import type { Logger, UserId } from '../auth-types.js';

export type SecurityEventType =
  | 'login_success'
  | 'login_failed'
  | 'login_two_factor_required'
  | 'two_factor_success'
  | 'two_factor_failed'
  | 'two_factor_send_failed'
  | 'session_revoked'
  | 'sessions_revoked_all'
  | 'session_refreshed'
  | 'refresh_token_reuse'
  | 'rate_limited'
  | 'account_locked'
  | 'phone_verified';

export type SecurityAuditEvent = {
  type: SecurityEventType;
  userId?: UserId;
  sourceAddress?: string;
  userAgent?: string;
  /**
   * Internal, human-readable reason (e.g. "user_not_found"). Never shown to callers.
   */
  description: string;
  /**
   * Extra non-secret context. Never passwords, codes, tokens or hashes.
   */
  data?: Record<string, unknown>;
  occurredAt: Date;
};

/**
 * Append-only sink for security events (database table, SIEM forwarder, log stream).
 */
export type AuditSink = {
  log(event: SecurityAuditEvent): void | Promise<void>;
};

export function createLoggerAuditSink(logger: Logger): AuditSink {
  return {
    log(event) {
      logger.info(`security event: ${event.type}`, {
        userId: event.userId,
        sourceAddress: event.sourceAddress,
        userAgent: event.userAgent,
        description: event.description,
        data: event.data,
        occurredAt: event.occurredAt.toISOString()
      });
    }
  };
}

/**
 * Emit without letting a failing sink change the outcome of the calling operation.
 * Failures are reported through `logger.warn`.
 */
export async function emitAuditEvent(
  sink: AuditSink | undefined,
  logger: Logger,
  event: SecurityAuditEvent
): Promise<void> {
  if (!sink) return;
  try {
    await sink.log(event);
  } catch (err) {
    logger.warn('audit sink failed', {
      type: event.type,
      error: err instanceof Error ? err.message : String(err)
    });
  }
}
