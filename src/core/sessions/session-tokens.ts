import { createHash, randomBytes as nodeRandomBytes, randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import { AuthError } from '../auth-error.js';
import type { SessionPolicy } from '../auth-policy.js';
import {
  asAccessToken,
  asAccessTokenId,
  asRefreshToken,
  asSessionId,
  asUserId,
  noopLogger
} from '../auth-types.js';
import type {
  Clock,
  Logger,
  RandomBytesFn,
  SessionId,
  TokenSubject,
  UserId
} from '../auth-types.js';
import type { CredentialHasher } from '../credentials/credential-hasher.js';
import type { SecurityStorage, SessionRecord } from '../storage/security-storage.js';
import { storeCall } from '../storage/store-call.js';
import type {
  AccessTokenClaims,
  ActiveSessionSummary,
  RefreshSessionResult,
  RevokeSessionResult,
  TokenPair
} from './session-types.js';

export const MIN_SIGNING_SECRET_LENGTH = 32;
const REFRESH_SECRET_BYTES = 32;

export type SessionCtx = {
  storage: Pick<SecurityStorage, 'sessions' | 'accounts'>;
  hasher: CredentialHasher;
  policy: SessionPolicy;
  signingSecret: string;
  clock: Clock;
  randomBytes: RandomBytesFn;
  generateId: () => string;
  logger: Logger;
};

export type SessionTokenService = {
  generateTokenPair(user: TokenSubject, deviceInfo: string, sourceAddress: string): Promise<TokenPair>;
  /**
   * Verified claims, or an `unauthorized` AuthError.
   */
  validateToken(accessToken: string): Promise<AccessTokenClaims>;
  /**
   * Idempotent; unknown or malformed tokens are ignored (`revoked: false`).
   */
  revokeSession(refreshToken: string): Promise<RevokeSessionResult>;
  revokeAllSessions(userId: UserId): Promise<number>;
  refreshSession(
    refreshToken: string,
    deviceInfo: string,
    sourceAddress: string
  ): Promise<RefreshSessionResult>;
  listActiveSessions(userId: UserId): Promise<ActiveSessionSummary[]>;
  cleanupExpiredSessions(): Promise<number>;
};

export type CreateSessionTokenServiceOptions = {
  storage: Pick<SecurityStorage, 'sessions' | 'accounts'>;
  hasher: CredentialHasher;
  policy: SessionPolicy;
  /**
   * HMAC key for HS256. Required; there is no fallback.
   */
  signingSecret: string;
  clock?: Clock;
  randomBytes?: RandomBytesFn;
  generateId?: () => string;
  logger?: Logger;
};

export function createSessionTokenService(
  options: CreateSessionTokenServiceOptions
): SessionTokenService {
  if (typeof options.signingSecret !== 'string' || options.signingSecret.length < MIN_SIGNING_SECRET_LENGTH) {
    throw new AuthError(
      'configuration',
      `token signing secret must be at least ${MIN_SIGNING_SECRET_LENGTH} characters`
    );
  }
  const ctx: SessionCtx = {
    storage: options.storage,
    hasher: options.hasher,
    policy: options.policy,
    signingSecret: options.signingSecret,
    clock: options.clock ?? { now: () => new Date() },
    randomBytes: options.randomBytes ?? nodeRandomBytes,
    generateId: options.generateId ?? randomUUID,
    logger: options.logger ?? noopLogger
  };

  return {
    generateTokenPair: (user, deviceInfo, sourceAddress) =>
      generateTokenPair(ctx, { user, deviceInfo, sourceAddress }),
    validateToken: accessToken => validateToken(ctx, accessToken),
    revokeSession: refreshToken => revokeSession(ctx, refreshToken),
    revokeAllSessions: userId => revokeAllSessions(ctx, userId),
    refreshSession: (refreshToken, deviceInfo, sourceAddress) =>
      refreshSession(ctx, { refreshToken, deviceInfo, sourceAddress }),
    listActiveSessions: userId => listActiveSessions(ctx, userId),
    cleanupExpiredSessions: () => cleanupExpiredSessions(ctx)
  };
}

export function deviceFingerprint(deviceInfo: string, sourceAddress: string): string {
  return createHash('sha256').update(`${deviceInfo}|${sourceAddress}`).digest('hex');
}

/**
 * Splits `<sessionId>.<secret>`. Returns null for anything else.
 */
export function parseRefreshToken(
  token: string
): { sessionId: SessionId; secret: string } | null {
  if (typeof token !== 'string' || token.length > 256) return null;
  const dot = token.indexOf('.');
  if (dot <= 0 || dot !== token.lastIndexOf('.')) return null;
  const sessionId = token.slice(0, dot);
  const secret = token.slice(dot + 1);
  if (!/^[A-Za-z0-9-]{1,64}$/.test(sessionId)) return null;
  if (!/^[A-Za-z0-9_-]{43}$/.test(secret)) return null;
  return { sessionId: asSessionId(sessionId), secret };
}

type MintedSession = { tokens: TokenPair; record: SessionRecord };

async function mintSession(
  ctx: SessionCtx,
  input: {
    user: TokenSubject;
    deviceInfo: string;
    sourceAddress: string;
    rotatedFromSessionId?: SessionId;
  }
): Promise<MintedSession> {
  const now = ctx.clock.now();
  if (!(now instanceof Date) || Number.isNaN(now.getTime())) {
    throw new AuthError('invalid_input', 'clock.now() must return a valid Date');
  }

  const sessionId = asSessionId(ctx.generateId());
  const jti = asAccessTokenId(ctx.generateId());
  const fingerprint = deviceFingerprint(input.deviceInfo, input.sourceAddress);

  const bytes = ctx.randomBytes(REFRESH_SECRET_BYTES);
  if (!(bytes instanceof Uint8Array) || bytes.length !== REFRESH_SECRET_BYTES) {
    throw new AuthError('internal_error', `randomBytes must return ${REFRESH_SECRET_BYTES} bytes`);
  }
  const secret = Buffer.from(bytes).toString('base64url');
  const refreshToken = asRefreshToken(`${sessionId}.${secret}`);
  const refreshTokenHash = await ctx.hasher.hashSecret(secret);

  const iat = Math.floor(now.getTime() / 1000);
  const accessTtlSeconds = Math.floor(ctx.policy.accessTokenTtlMs / 1000);
  const claims: AccessTokenClaims = {
    sub: input.user.id,
    user_id: input.user.id,
    tenant_id: input.user.tenantId,
    email: input.user.email,
    role: input.user.role,
    session_id: sessionId,
    device_fingerprint: fingerprint,
    jti,
    iss: ctx.policy.issuer,
    iat,
    nbf: iat,
    exp: iat + accessTtlSeconds
  };
  const accessToken = asAccessToken(jwt.sign(claims, ctx.signingSecret, { algorithm: 'HS256' }));

  const expiresAt = new Date(now.getTime() + ctx.policy.refreshTokenTtlMs);
  const record: SessionRecord = {
    id: sessionId,
    userId: input.user.id,
    refreshTokenHash,
    accessTokenId: jti,
    deviceFingerprint: fingerprint,
    userAgent: input.deviceInfo || undefined,
    sourceAddress: input.sourceAddress || undefined,
    createdAt: now,
    expiresAt,
    revoked: false,
    rotatedFromSessionId: input.rotatedFromSessionId
  };

  return {
    record,
    tokens: {
      accessToken,
      refreshToken,
      tokenType: 'Bearer',
      accessTokenExpiresAt: new Date(claims.exp * 1000),
      expiresAt,
      sessionId
    }
  };
}

export async function generateTokenPair(
  ctx: SessionCtx,
  input: { user: TokenSubject; deviceInfo: string; sourceAddress: string }
): Promise<TokenPair> {
  if (!input.user?.id) throw new AuthError('invalid_input', 'user.id is required');
  const minted = await mintSession(ctx, input);
  await storeCall('sessions.createSession', () => ctx.storage.sessions.createSession(minted.record));
  return minted.tokens;
}

export async function validateToken(ctx: SessionCtx, accessToken: string): Promise<AccessTokenClaims> {
  if (typeof accessToken !== 'string' || accessToken.length === 0) {
    throw invalidTokenError('missing token');
  }
  const now = ctx.clock.now();

  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(accessToken, ctx.signingSecret, {
      algorithms: ['HS256'],
      issuer: ctx.policy.issuer,
      clockTimestamp: Math.floor(now.getTime() / 1000),
      clockTolerance: ctx.policy.clockToleranceSeconds
    });
  } catch (err) {
    throw invalidTokenError(err instanceof Error ? err.message : 'invalid token', err);
  }

  const claims = toAccessTokenClaims(decoded);
  if (!claims) throw invalidTokenError('malformed claims');

  const session = await storeCall('sessions.findActiveByAccessTokenId', () =>
    ctx.storage.sessions.findActiveByAccessTokenId(claims.jti, now)
  );
  if (!session) throw invalidTokenError('session revoked or expired');
  if (session.id !== claims.session_id || session.userId !== claims.user_id) {
    throw invalidTokenError('session does not match token');
  }
  return claims;
}

export async function revokeSession(
  ctx: SessionCtx,
  refreshToken: string
): Promise<RevokeSessionResult> {
  const parsed = parseRefreshToken(refreshToken);
  // Logout should be idempotent.
  if (!parsed) return { revoked: false };

  const session = await storeCall('sessions.getSessionById', () =>
    ctx.storage.sessions.getSessionById(parsed.sessionId)
  );
  if (!session || session.revoked) return { revoked: false };
  if (!(await ctx.hasher.verify(parsed.secret, session.refreshTokenHash))) {
    return { revoked: false };
  }

  const now = ctx.clock.now();
  const revoked = await storeCall('sessions.revokeSession', () =>
    ctx.storage.sessions.revokeSession(session.id, now)
  );
  return revoked ? { revoked: true, userId: session.userId, sessionId: session.id } : { revoked: false };
}

export async function revokeAllSessions(ctx: SessionCtx, userId: UserId): Promise<number> {
  if (!userId) throw new AuthError('invalid_input', 'userId is required');
  const now = ctx.clock.now();
  const revoked = await storeCall('sessions.revokeAllUserSessions', () =>
    ctx.storage.sessions.revokeAllUserSessions(userId, now)
  );
  ctx.logger.debug('sessions revoked', { revoked });
  return revoked;
}

/**
 * Rotation on use: the presented session is revoked and a fresh pair is minted. Presenting a
 * refresh token whose session is already revoked is treated as replay.
 */
export async function refreshSession(
  ctx: SessionCtx,
  input: { refreshToken: string; deviceInfo: string; sourceAddress: string }
): Promise<RefreshSessionResult> {
  const parsed = parseRefreshToken(input.refreshToken);
  if (!parsed) return { ok: false, reason: 'invalid' };

  const session = await storeCall('sessions.getSessionById', () =>
    ctx.storage.sessions.getSessionById(parsed.sessionId)
  );
  if (!session) return { ok: false, reason: 'invalid' };
  // Only a holder of the secret can trigger reuse handling.
  if (!(await ctx.hasher.verify(parsed.secret, session.refreshTokenHash))) {
    return { ok: false, reason: 'invalid' };
  }

  const now = ctx.clock.now();
  if (session.revoked) {
    await revokeAllForReuse(ctx, session.userId, now);
    return { ok: false, reason: 'reused', userId: session.userId };
  }
  if (session.expiresAt.getTime() <= now.getTime()) {
    return { ok: false, reason: 'expired', userId: session.userId };
  }

  const account = await storeCall('accounts.findById', () =>
    ctx.storage.accounts.findById(session.userId)
  );
  if (!account || !account.isActive) {
    await storeCall('sessions.revokeSession', () =>
      ctx.storage.sessions.revokeSession(session.id, now)
    );
    return { ok: false, reason: 'invalid', userId: session.userId };
  }

  const minted = await mintSession(ctx, {
    user: { id: account.id, tenantId: account.tenantId, email: account.email, role: account.role },
    deviceInfo: input.deviceInfo,
    sourceAddress: input.sourceAddress,
    rotatedFromSessionId: session.id
  });
  const rotated = await storeCall('sessions.rotateSession', () =>
    ctx.storage.sessions.rotateSession(session.id, minted.record, now)
  );
  if (!rotated) {
    // Someone else exchanged this token first.
    await revokeAllForReuse(ctx, session.userId, now);
    return { ok: false, reason: 'reused', userId: session.userId };
  }

  return { ok: true, userId: session.userId, tokens: minted.tokens, rotatedFromSessionId: session.id };
}

export async function listActiveSessions(
  ctx: SessionCtx,
  userId: UserId
): Promise<ActiveSessionSummary[]> {
  const now = ctx.clock.now();
  const sessions = await storeCall('sessions.listActiveSessionsForUser', () =>
    ctx.storage.sessions.listActiveSessionsForUser(userId, now)
  );
  return sessions.map(s => ({
    sessionId: s.id,
    createdAt: s.createdAt,
    expiresAt: s.expiresAt,
    deviceFingerprint: s.deviceFingerprint,
    userAgent: s.userAgent,
    sourceAddress: s.sourceAddress
  }));
}

export async function cleanupExpiredSessions(ctx: SessionCtx): Promise<number> {
  const now = ctx.clock.now();
  const removed = await storeCall('sessions.deleteExpiredSessions', () =>
    ctx.storage.sessions.deleteExpiredSessions(now)
  );
  ctx.logger.debug('expired sessions swept', { removed });
  return removed;
}

async function revokeAllForReuse(ctx: SessionCtx, userId: UserId, now: Date): Promise<void> {
  const revoked = await storeCall('sessions.revokeAllUserSessions', () =>
    ctx.storage.sessions.revokeAllUserSessions(userId, now)
  );
  ctx.logger.warn('refresh token reuse; all sessions revoked', { revoked });
}

function invalidTokenError(message: string, cause?: unknown): AuthError {
  return new AuthError('unauthorized', `invalid access token: ${message}`, {
    cause,
    publicMessage: 'Session expired. Please sign in again.'
  });
}

function toAccessTokenClaims(decoded: string | JwtPayload): AccessTokenClaims | null {
  if (typeof decoded === 'string') return null;
  const {
    sub,
    user_id,
    tenant_id,
    email,
    role,
    session_id,
    device_fingerprint,
    jti,
    iss,
    iat,
    exp,
    nbf
  } = decoded;
  if (
    typeof sub !== 'string' ||
    typeof user_id !== 'string' ||
    typeof tenant_id !== 'string' ||
    typeof email !== 'string' ||
    typeof role !== 'string' ||
    typeof session_id !== 'string' ||
    typeof device_fingerprint !== 'string' ||
    typeof jti !== 'string' ||
    typeof iss !== 'string' ||
    typeof iat !== 'number' ||
    typeof exp !== 'number' ||
    typeof nbf !== 'number'
  ) {
    return null;
  }
  if (sub !== user_id || !user_id || !session_id || !jti) return null;
  return {
    sub,
    user_id: asUserId(user_id),
    tenant_id,
    email,
    role,
    session_id: asSessionId(session_id),
    device_fingerprint,
    jti: asAccessTokenId(jti),
    iss,
    iat,
    exp,
    nbf
  };
}
