import { hashRaw } from "@node-rs/argon2";
import { randomBytes as nodeRandomBytes, timingSafeEqual } from "node:crypto";
import { AuthError } from "../auth-error.js";
import { defaultArgon2Params, validateArgon2Params } from "../auth-policy.js";
import type { Argon2Params } from "../auth-policy.js";
import type { RandomBytesFn } from "../auth-types.js";

export const ARGON2ID_TAG = "argon2id";
export const ARGON2_VERSION = 19;

// Bounds applied to parameters read back from a stored hash. Anything outside them is treated
// as a non-matching hash rather than handed to the KDF.
const MAX_MEMORY_COST_KIB = 1024 * 1024;
const MAX_TIME_COST = 64;
const MIN_SALT_BYTES = 8;
const MAX_SALT_BYTES = 1024;
const MIN_KEY_BYTES = 16;
const MAX_KEY_BYTES = 128;

export type ParsedEncodedHash = {
  params: Argon2Params;
  salt: Buffer;
  key: Buffer;
};

/**
 * Encodes using the PHC string format, e.g.:
 * "$argon2id$v=19$m=131072,t=4,p=4$<salt>$<key>"
 *
 * Salt and key are unpadded standard base64.
 */
export async function hash(
  secret: string,
  salt: Uint8Array,
  params: Argon2Params = defaultArgon2Params,
): Promise<string> {
  if (typeof secret !== "string" || secret.length === 0) {
    throw new AuthError("invalid_input", "secret must be a non-empty string");
  }
  if (!(salt instanceof Uint8Array) || salt.length < MIN_SALT_BYTES || salt.length > MAX_SALT_BYTES) {
    throw new AuthError("invalid_input", `salt must be between ${MIN_SALT_BYTES} and ${MAX_SALT_BYTES} bytes`);
  }
  validateArgon2Params(params);

  const key = await hashRaw(secret, {
    memoryCost: params.memoryCost,
    timeCost: params.timeCost,
    parallelism: params.parallelism,
    outputLen: params.outputLen,
    salt,
  });

  return encodeHash(params, salt, key);
}

/**
 * Recomputes the key with the parameters embedded in `encodedHash` and compares in constant time.
 * Never throws: malformed or unsupported encodings verify to `false`.
 */
export async function verify(secret: string, encodedHash: string): Promise<boolean> {
  if (typeof secret !== "string") return false;
  const parsed = parseEncodedHash(encodedHash);
  if (!parsed) return false;

  let actual: Buffer;
  try {
    actual = await hashRaw(secret, {
      memoryCost: parsed.params.memoryCost,
      timeCost: parsed.params.timeCost,
      parallelism: parsed.params.parallelism,
      outputLen: parsed.key.length,
      salt: parsed.salt,
    });
  } catch {
    // A KDF rejection of stored parameters is indistinguishable from a wrong secret.
    return false;
  }
  if (actual.length !== parsed.key.length) return false;
  return timingSafeEqual(actual, parsed.key);
}

export function generateSalt(length: number = 16, randomBytes: RandomBytesFn = nodeRandomBytes): Uint8Array {
  if (!Number.isInteger(length) || length < MIN_SALT_BYTES || length > MAX_SALT_BYTES) {
    throw new AuthError("invalid_input", `salt length must be between ${MIN_SALT_BYTES} and ${MAX_SALT_BYTES}`);
  }
  const bytes = randomBytes(length);
  if (!(bytes instanceof Uint8Array) || bytes.length !== length) {
    throw new AuthError("internal_error", `randomBytes must return ${length} bytes`);
  }
  return bytes;
}

export function parseEncodedHash(encodedHash: string): ParsedEncodedHash | null {
  if (typeof encodedHash !== "string") return null;

  // ["", "argon2id", "v=19", "m=...,t=...,p=...", salt, key]
  const parts = encodedHash.split("$");
  if (parts.length !== 6 || parts[0] !== "") return null;
  const [, tag, versionPart, paramsPart, saltPart, keyPart] = parts;
  if (tag !== ARGON2ID_TAG) return null;
  if (versionPart !== `v=${ARGON2_VERSION}`) return null;
  if (!paramsPart || !saltPart || !keyPart) return null;

  const costs = parseParamPart(paramsPart);
  if (!costs) return null;

  const salt = decodeCanonicalBase64(saltPart);
  const key = decodeCanonicalBase64(keyPart);
  if (!salt || !key) return null;
  if (salt.length < MIN_SALT_BYTES || salt.length > MAX_SALT_BYTES) return null;
  if (key.length < MIN_KEY_BYTES || key.length > MAX_KEY_BYTES) return null;

  return { params: { ...costs, outputLen: key.length }, salt, key };
}

/**
 * True when the stored parameters are weaker than `desired` and the secret should be rehashed
 * at the next successful verification.
 */
export function needsRehash(encodedHash: string, desired: Argon2Params): boolean {
  const parsed = parseEncodedHash(encodedHash);
  if (!parsed) return true;
  const stored = parsed.params;
  return (
    stored.memoryCost < desired.memoryCost ||
    stored.timeCost < desired.timeCost ||
    stored.parallelism < desired.parallelism ||
    stored.outputLen < desired.outputLen
  );
}

export type CredentialHasher = {
  readonly params: Argon2Params;
  hash(secret: string, salt: Uint8Array): Promise<string>;
  verify(secret: string, encodedHash: string): Promise<boolean>;
  generateSalt(length?: number): Uint8Array;
  /**
   * Fresh salt of the configured length, then `hash`.
   */
  hashSecret(secret: string): Promise<string>;
  needsRehash(encodedHash: string): boolean;
  /**
   * Spend one verification's worth of work against a throwaway hash. Used when there is no
   * stored hash to compare against, so timing does not reveal that fact.
   */
  dummyVerify(secret: string): Promise<void>;
};

export type CreateCredentialHasherOptions = {
  params?: Argon2Params;
  saltLength?: number;
  randomBytes?: RandomBytesFn;
};

export function createCredentialHasher(options: CreateCredentialHasherOptions = {}): CredentialHasher {
  const params = options.params ?? defaultArgon2Params;
  validateArgon2Params(params);
  const saltLength = options.saltLength ?? 16;
  const randomBytes = options.randomBytes ?? nodeRandomBytes;

  let dummyHash: Promise<string> | undefined;

  return {
    params,
    hash: (secret, salt) => hash(secret, salt, params),
    verify,
    generateSalt: (length = saltLength) => generateSalt(length, randomBytes),
    hashSecret: async secret => hash(secret, generateSalt(saltLength, randomBytes), params),
    needsRehash: encodedHash => needsRehash(encodedHash, params),
    async dummyVerify(secret) {
      dummyHash ??= hash("dummy-secret-do-not-use", generateSalt(saltLength, randomBytes), params);
      await verify(secret, await dummyHash);
    },
  };
}

function encodeHash(params: Argon2Params, salt: Uint8Array, key: Uint8Array): string {
  return [
    "",
    ARGON2ID_TAG,
    `v=${ARGON2_VERSION}`,
    `m=${params.memoryCost},t=${params.timeCost},p=${params.parallelism}`,
    encodeBase64(salt),
    encodeBase64(key),
  ].join("$");
}

function parseParamPart(paramStr: string): Omit<Argon2Params, "outputLen"> | null {
  // "m=131072,t=4,p=4", in exactly this order.
  const pairs = paramStr.split(",");
  if (pairs.length !== 3) return null;
  const values = new Map<string, number>();
  for (const pair of pairs) {
    const [k, v, extra] = pair.split("=");
    if (!k || v === undefined || extra !== undefined) return null;
    const n = toCanonicalInt(v);
    if (n === null) return null;
    values.set(k, n);
  }
  if (pairs.map(p => p.split("=")[0]).join(",") !== "m,t,p") return null;

  const memoryCost = values.get("m");
  const timeCost = values.get("t");
  const parallelism = values.get("p");
  if (memoryCost === undefined || timeCost === undefined || parallelism === undefined) return null;
  if (parallelism < 1 || parallelism > 255) return null;
  if (memoryCost < 8 * parallelism || memoryCost > MAX_MEMORY_COST_KIB) return null;
  if (timeCost < 1 || timeCost > MAX_TIME_COST) return null;
  return { memoryCost, timeCost, parallelism };
}

function toCanonicalInt(v: string): number | null {
  if (!/^[1-9][0-9]{0,9}$/.test(v)) return null;
  const n = Number.parseInt(v, 10);
  return Number.isSafeInteger(n) ? n : null;
}

function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64").replace(/=+$/, "");
}

function decodeCanonicalBase64(s: string): Buffer | null {
  if (!/^[A-Za-z0-9+/]+$/.test(s)) return null;
  const bytes = Buffer.from(s, "base64");
  // Reject encodings with non-zero trailing bits; they would alias another string.
  if (encodeBase64(bytes) !== s) return null;
  return bytes;
}
