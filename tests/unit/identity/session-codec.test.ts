import { describe, it, expect } from 'vitest';
import { EncryptJWT } from 'jose';
import {
  SessionCodec,
  decodeSessionKey,
  DEFAULT_SESSION_TTL_MS,
} from '../../../src/identity/session-codec.js';
import { DndServerError } from '../../../src/errors.js';

const KEY = new Uint8Array(32).fill(1);
const OTHER_KEY = new Uint8Array(32).fill(2);

// 2030-01-01T00:00:00Z, whole seconds.
const T0 = Date.UTC(2030, 0, 1);

function clockAt(start: number): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

const BASE64URL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

describe('SessionCodec', () => {
  // ── Construction ──────────────────────────────────────────────

  it('rejects keys that are not 32 bytes', () => {
    expect(() => new SessionCodec({ key: new Uint8Array(16) })).toThrow(DndServerError);
    expect(() => new SessionCodec({ key: new Uint8Array(16) })).toThrow(
      'Session key must be 32 bytes, got 16',
    );
  });

  it('generates a key when none is given', async () => {
    const codec = new SessionCodec();
    const { token } = await codec.issue('alice');
    expect((await codec.validate(token)).ok).toBe(true);
    expect(codec.ttlMs).toBe(DEFAULT_SESSION_TTL_MS);
  });

  // ── Round trip ────────────────────────────────────────────────

  it('issues a token whose claims validate back', async () => {
    const clock = clockAt(T0);
    const codec = new SessionCodec({ key: KEY, now: clock.now });

    const issued = await codec.issue('alice', { role: 'root' });
    const result = await codec.validate(issued.token);

    expect(issued.claims).toEqual({
      subject: 'alice',
      role: 'root',
      sessionId: expect.stringMatching(/^[0-9a-f-]{36}$/),
      issuedAt: T0,
      expiresAt: T0 + DEFAULT_SESSION_TTL_MS,
    });
    expect(result).toEqual({ ok: true, claims: issued.claims });
  });

  it('omits the role when not given', async () => {
    const codec = new SessionCodec({ key: KEY, now: clockAt(T0).now });
    const { token } = await codec.issue('bob');
    const result = await codec.validate(token);
    expect(result.ok && result.claims.role).toBeNull();
  });

  it('gives every token its own session id', async () => {
    const codec = new SessionCodec({ key: KEY });
    const a = await codec.issue('alice');
    const b = await codec.issue('alice');
    expect(a.claims.sessionId).not.toBe(b.claims.sessionId);
    expect(a.token).not.toBe(b.token);
  });

  it('produces a five-segment compact token', async () => {
    const codec = new SessionCodec({ key: KEY });
    const { token } = await codec.issue('alice');
    expect(token.split('.')).toHaveLength(5);
    expect(token).toMatch(/^[A-Za-z0-9_.-]+$/);
  });

  it('does not expose the subject in the token', async () => {
    const codec = new SessionCodec({ key: KEY });
    const { token } = await codec.issue('very-distinctive-name');
    const decoded = token
      .split('.')
      .map((segment) => Buffer.from(segment, 'base64url').toString('latin1'))
      .join('');
    expect(decoded).not.toContain('very-distinctive-name');
  });

  it('rejects a non-positive TTL', async () => {
    const codec = new SessionCodec({ key: KEY });
    await expect(codec.issue('alice', { ttlMs: 0 })).rejects.toThrow('Session TTL must be positive');
  });

  // ── Expiry ────────────────────────────────────────────────────

  it('accepts a token up to its expiry and reports expired after', async () => {
    const clock = clockAt(T0);
    const codec = new SessionCodec({ key: KEY, now: clock.now });
    const { token } = await codec.issue('alice', { ttlMs: 60_000 });

    clock.advance(59_000);
    expect((await codec.validate(token)).ok).toBe(true);

    clock.advance(2_000);
    expect(await codec.validate(token)).toEqual({ ok: false, reason: 'expired' });
  });

  it('stays valid at the exact expiry instant and expires one millisecond later', async () => {
    const clock = clockAt(T0);
    const codec = new SessionCodec({ key: KEY, now: clock.now });
    const { token, claims } = await codec.issue('alice', { ttlMs: 60_000 });

    clock.advance(claims.expiresAt - T0);
    expect((await codec.validate(token)).ok).toBe(true);

    clock.advance(1);
    expect(await codec.validate(token)).toEqual({ ok: false, reason: 'expired' });

    clock.advance(999);
    expect(await codec.validate(token)).toEqual({ ok: false, reason: 'expired' });
  });

  it('reports expired long after expiry', async () => {
    const clock = clockAt(T0);
    const codec = new SessionCodec({ key: KEY, now: clock.now, ttlMs: 1_000 });
    const { token } = await codec.issue('alice');

    clock.advance(24 * 60 * 60 * 1000);
    expect(await codec.validate(token)).toEqual({ ok: false, reason: 'expired' });
  });

  // ── Future issue time ─────────────────────────────────────────

  it('rejects a token issued further in the future than the skew allows', async () => {
    const issuer = new SessionCodec({ key: KEY, now: () => T0 + 120_000 });
    const validator = new SessionCodec({ key: KEY, now: () => T0, clockSkewMs: 30_000 });

    const { token } = await issuer.issue('alice');
    expect(await validator.validate(token)).toEqual({ ok: false, reason: 'invalid' });
  });

  it('tolerates issue times within the skew', async () => {
    const issuer = new SessionCodec({ key: KEY, now: () => T0 + 20_000 });
    const validator = new SessionCodec({ key: KEY, now: () => T0, clockSkewMs: 30_000 });

    const { token } = await issuer.issue('alice');
    expect((await validator.validate(token)).ok).toBe(true);
  });

  // ── Tampering ─────────────────────────────────────────────────

  it('rejects tokens under a different key', async () => {
    const issuer = new SessionCodec({ key: KEY });
    const validator = new SessionCodec({ key: OTHER_KEY });
    const { token } = await issuer.issue('alice');
    expect(await validator.validate(token)).toEqual({ ok: false, reason: 'invalid' });
  });

  it('rejects every single-character substitution', async () => {
    const codec = new SessionCodec({ key: KEY });
    const { token } = await codec.issue('alice', { role: 'player' });

    for (let i = 0; i < token.length; i++) {
      const original = token.charAt(i);
      if (original === '.') continue;

      const index = BASE64URL_ALPHABET.indexOf(original);
      const replacement = BASE64URL_ALPHABET.charAt((index + 1) % BASE64URL_ALPHABET.length);
      const tampered = token.slice(0, i) + replacement + token.slice(i + 1);

      const result = await codec.validate(tampered);
      expect(result.ok, `position ${i}`).toBe(false);
    }
  });

  it.each([
    ['empty string', ''],
    ['garbage', 'not-a-token'],
    ['three segments', 'a.b.c'],
    ['six segments', 'a.b.c.d.e.f'],
    ['padding characters', 'a.b.c.d.e='],
    ['standard base64 alphabet', 'a+b.c.d.e'],
  ])('rejects %s as invalid', async (_label, token) => {
    const codec = new SessionCodec({ key: KEY });
    expect(await codec.validate(token)).toEqual({ ok: false, reason: 'invalid' });
  });

  it('rejects a token with trailing whitespace', async () => {
    const codec = new SessionCodec({ key: KEY });
    const { token } = await codec.issue('alice');
    expect(await codec.validate(`${token} `)).toEqual({ ok: false, reason: 'invalid' });
  });

  it('rejects an authentic token that lacks required claims', async () => {
    const token = await new EncryptJWT({ role: 'root' })
      .setProtectedHeader({ alg: 'dir', enc: 'A256GCM' })
      .setIssuedAt(Math.floor(T0 / 1000))
      .setExpirationTime(Math.floor(T0 / 1000) + 60)
      .encrypt(KEY);

    const codec = new SessionCodec({ key: KEY, now: () => T0 });
    expect(await codec.validate(token)).toEqual({ ok: false, reason: 'invalid' });
  });

  it('rejects an authentic token carrying an unknown role', async () => {
    const token = await new EncryptJWT({ role: 'dungeon-master' })
      .setProtectedHeader({ alg: 'dir', enc: 'A256GCM' })
      .setSubject('alice')
      .setJti('sid')
      .setIssuedAt(Math.floor(T0 / 1000))
      .setExpirationTime(Math.floor(T0 / 1000) + 60)
      .encrypt(KEY);

    const codec = new SessionCodec({ key: KEY, now: () => T0 });
    expect(await codec.validate(token)).toEqual({ ok: false, reason: 'invalid' });
  });

  it('rejects a token using a different content encryption', async () => {
    const token = await new EncryptJWT({})
      .setProtectedHeader({ alg: 'dir', enc: 'A128CBC-HS256' })
      .setSubject('alice')
      .setJti('sid')
      .setIssuedAt(Math.floor(T0 / 1000))
      .setExpirationTime(Math.floor(T0 / 1000) + 60)
      .encrypt(KEY);

    const codec = new SessionCodec({ key: KEY, now: () => T0 });
    expect(await codec.validate(token)).toEqual({ ok: false, reason: 'invalid' });
  });
});

describe('decodeSessionKey', () => {
  it('decodes a base64 32-byte key', () => {
    const encoded = Buffer.from(KEY).toString('base64');
    expect(decodeSessionKey(encoded)).toEqual(KEY);
  });

  it('rejects keys of the wrong length', () => {
    expect(() => decodeSessionKey('c2hvcnQ=')).toThrow('Session key must decode to 32 bytes, got 5');
  });
});
