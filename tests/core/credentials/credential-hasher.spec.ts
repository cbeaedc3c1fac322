import { describe, expect, it } from 'vitest';
import {
  createCredentialHasher,
  generateSalt,
  hash,
  needsRehash,
  parseEncodedHash,
  verify
} from '../../../src/core/credentials/credential-hasher.js';
import { fastArgon2Params } from '../../support/fixtures.js';

const salt = (fill: number) => new Uint8Array(16).fill(fill);

describe('core/credentials/credential-hasher', () => {
  it('hashes into a self-describing argon2id string and verifies it', async () => {
    const encoded = await hash('correct horse battery staple', salt(1), fastArgon2Params);
    expect(encoded.startsWith('$argon2id$v=19$m=1024,t=1,p=1$')).toBe(true);
    expect(encoded.split('$')[4]).toBe(Buffer.from(salt(1)).toString('base64').replace(/=+$/, ''));

    await expect(verify('correct horse battery staple', encoded)).resolves.toBe(true);
    await expect(verify('correct horse battery stapler', encoded)).resolves.toBe(false);
  });

  it('is deterministic for the same secret and salt', async () => {
    const a = await hash('pw-1', salt(2), fastArgon2Params);
    const b = await hash('pw-1', salt(2), fastArgon2Params);
    expect(a).toBe(b);
  });

  it('produces different hashes for different salts', async () => {
    const a = await hash('pw-1', salt(3), fastArgon2Params);
    const b = await hash('pw-1', salt(4), fastArgon2Params);
    expect(a).not.toBe(b);
  });

  it('rejects every single-character mutation of the encoded hash', async () => {
    const encoded = await hash('pw-1', salt(5), fastArgon2Params);
    for (let i = 0; i < encoded.length; i++) {
      const replacement = encoded[i] === 'A' ? 'B' : 'A';
      const mutated = `${encoded.slice(0, i)}${replacement}${encoded.slice(i + 1)}`;
      await expect(verify('pw-1', mutated)).resolves.toBe(false);
    }
  });

  it('verifies with the parameters stored in the hash, not the current ones', async () => {
    const encoded = await hash('pw-1', salt(6), { ...fastArgon2Params, timeCost: 2 });
    const hasher = createCredentialHasher({ params: fastArgon2Params });
    await expect(hasher.verify('pw-1', encoded)).resolves.toBe(true);
  });

  it('treats malformed encodings as non-matching instead of throwing', async () => {
    await expect(verify('pw', '')).resolves.toBe(false);
    await expect(verify('pw', 'not-a-hash')).resolves.toBe(false);
    await expect(verify('pw', '$argon2i$v=19$m=1024,t=1,p=1$AAAAAAAAAAAAAAAAAAAAAA$AAAA')).resolves.toBe(
      false
    );
    await expect(
      verify('pw', '$argon2id$v=19$m=1024,t=1,p=1,x=1$AAAAAAAAAAAAAAAAAAAAAA$AAAAAAAAAAAAAAAAAAAAAA')
    ).resolves.toBe(false);
    // Parameters beyond the accepted bounds are never handed to the KDF.
    await expect(
      verify(
        'pw',
        '$argon2id$v=19$m=4194304,t=1,p=1$AAAAAAAAAAAAAAAAAAAAAA$AAAAAAAAAAAAAAAAAAAAAA'
      )
    ).resolves.toBe(false);
  });

  it('parses the encoded parameters', async () => {
    const encoded = await hash('pw-1', salt(7), fastArgon2Params);
    const parsed = parseEncodedHash(encoded);
    expect(parsed?.params).toEqual(fastArgon2Params);
    expect(parsed?.salt.equals(Buffer.from(salt(7)))).toBe(true);
    expect(parsed?.key.length).toBe(32);
    expect(parseEncodedHash('$argon2id$v=19$m=01024,t=1,p=1$AAAAAAAAAAAAAAAAAAAAAA$AAAAAAAAAAAAAAAAAAAAAA')).toBeNull();
  });

  it('rejects empty secrets and short salts', async () => {
    await expect(hash('', salt(1), fastArgon2Params)).rejects.toMatchObject({ code: 'invalid_input' });
    await expect(hash('pw', new Uint8Array(4), fastArgon2Params)).rejects.toMatchObject({
      code: 'invalid_input'
    });
    await expect(hash('pw', salt(1), { ...fastArgon2Params, memoryCost: 512 })).rejects.toMatchObject({
      code: 'invalid_input'
    });
  });

  it('generates salts of the requested length from the injected source', () => {
    const s = generateSalt(24, n => new Uint8Array(n).fill(7));
    expect(s).toEqual(new Uint8Array(24).fill(7));
    expect(() => generateSalt(4)).toThrow(/salt length/);
    expect(() => generateSalt(16, () => new Uint8Array(3))).toThrow(/randomBytes must return 16 bytes/);
  });

  it('signals needsRehash when the desired parameters are stronger', async () => {
    const encoded = await hash('pw', salt(8), fastArgon2Params);
    expect(needsRehash(encoded, fastArgon2Params)).toBe(false);
    expect(needsRehash(encoded, { ...fastArgon2Params, memoryCost: 2048 })).toBe(true);
    expect(needsRehash(encoded, { ...fastArgon2Params, outputLen: 64 })).toBe(true);
    expect(needsRehash('garbage', fastArgon2Params)).toBe(true);
  });

  it('hashSecret salts with the configured length and dummyVerify completes', async () => {
    const hasher = createCredentialHasher({
      params: fastArgon2Params,
      saltLength: 20,
      randomBytes: n => new Uint8Array(n).fill(3)
    });
    const encoded = await hasher.hashSecret('pw-2');
    expect(parseEncodedHash(encoded)?.salt.length).toBe(20);
    await expect(hasher.verify('pw-2', encoded)).resolves.toBe(true);
    await expect(hasher.dummyVerify('anything')).resolves.toBeUndefined();
  });
});
