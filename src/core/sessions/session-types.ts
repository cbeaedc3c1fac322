import type {
  AccessToken,
  AccessTokenId,
  RefreshToken,
  SessionId,
  UserId
} from '../auth-types.js';

/**
 * Claims carried by every access token.
 */
export type AccessTokenClaims = {
  sub: string;
  user_id: UserId;
  tenant_id: string;
  email: string;
  role: string;
  session_id: SessionId;
  device_fingerprint: string;
  jti: AccessTokenId;
  iss: string;
  iat: number;
  exp: number;
  nbf: number;
};

export type TokenPair = {
  accessToken: AccessToken;
  /**
   * `<sessionId>.<secret>`; only a hash of the secret part is stored.
   */
  refreshToken: RefreshToken;
  tokenType: 'Bearer';
  accessTokenExpiresAt: Date;
  /**
   * Session (refresh token) expiry.
   */
  expiresAt: Date;
  sessionId: SessionId;
};

export type RefreshSessionResult =
  | { ok: true; userId: UserId; tokens: TokenPair; rotatedFromSessionId: SessionId }
  | {
      ok: false;
      /**
       * `reused`: the token belonged to a session that was already revoked or rotated. Every
       * session of the user has been revoked as a consequence.
       */
      reason: 'invalid' | 'expired' | 'reused';
      userId?: UserId;
    };

export type RevokeSessionResult =
  | { revoked: true; userId: UserId; sessionId: SessionId }
  | { revoked: false };

export type ActiveSessionSummary = {
  sessionId: SessionId;
  createdAt: Date;
  expiresAt: Date;
  deviceFingerprint: string;
  userAgent?: string;
  sourceAddress?: string;
};
