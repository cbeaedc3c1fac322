export type Brand<T, B extends string> = T & { readonly __brand: B };

export type UserId = Brand<string, 'UserId'>;
export type SessionId = Brand<string, 'SessionId'>;
export type AccessTokenId = Brand<string, 'AccessTokenId'>;
export type ChallengeId = Brand<string, 'ChallengeId'>;
export type AccessToken = Brand<string, 'AccessToken'>;
export type RefreshToken = Brand<string, 'RefreshToken'>;

export type RandomBytesFn = (size: number) => Uint8Array;
export type Clock = { now: () => Date };

export type LogMeta = Record<string, unknown>;

/**
 * Structural logger. Pass pino/winston/console-compatible objects; never receives secrets.
 */
export type Logger = {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
};

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

/**
 * Claims-bearing view of an account, as needed to mint tokens.
 */
export type TokenSubject = {
  id: UserId;
  tenantId: string;
  email: string;
  role: string;
};

export type RequestContext = {
  /**
   * Client address as seen by your server (trusted proxy header or socket address).
   */
  sourceAddress: string;
  /**
   * User-Agent header value.
   */
  userAgent?: string;
};

export function asUserId(v: string): UserId {
  return v as UserId;
}

export function asSessionId(v: string): SessionId {
  return v as SessionId;
}

export function asAccessTokenId(v: string): AccessTokenId {
  return v as AccessTokenId;
}

export function asChallengeId(v: string): ChallengeId {
  return v as ChallengeId;
}

export function asAccessToken(v: string): AccessToken {
  return v as AccessToken;
}

export function asRefreshToken(v: string): RefreshToken {
  return v as RefreshToken;
}
