import { scrypt, randomBytes, timingSafeEqual } from 'node:crypto';

// ── Constants ────────────────────────────────────────────────────

const SCRYPT_KEYLEN = 64;
const SALT_BYTES = 16;
const SCRYPT_COST = 16384;  // N = 2^14
const SCRYPT_BLOCK_SIZE = 8;
const SCRYPT_PARALLELIZATION = 1;

// Upper bounds accepted when reading parameters back out of a stored hash.
const MAX_SCRYPT_COST = 1 << 20;
const MAX_SCRYPT_BLOCK_SIZE = 32;
const MAX_SCRYPT_PARALLELIZATION = 16;
const SCRYPT_MAXMEM = 256 * 1024 * 1024;

// Format: $scrypt$N$r$p$salt$hash (all base64)
//
// node:crypto runs scrypt on the libuv thread pool, so hashing never blocks
// the event loop that serves other requests.

interface ScryptParams {
  readonly N: number;
  readonly r: number;
  readonly p: number;
  readonly salt: Buffer;
  readonly expected: Buffer;
}

// ── hashPassword ─────────────────────────────────────────────────

export function hashPassword(plain: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const salt = randomBytes(SALT_BYTES);

    scrypt(
      plain,
      salt,
      SCRYPT_KEYLEN,
      { N: SCRYPT_COST, r: SCRYPT_BLOCK_SIZE, p: SCRYPT_PARALLELIZATION },
      (err, derivedKey) => {
        if (err) {
          reject(err);
          return;
        }
        const encoded = [
          '$scrypt',
          SCRYPT_COST,
          SCRYPT_BLOCK_SIZE,
          SCRYPT_PARALLELIZATION,
          salt.toString('base64'),
          derivedKey.toString('base64'),
        ].join('$');
        resolve(encoded);
      },
    );
  });
}

// ── verifyPassword ───────────────────────────────────────────────

export function verifyPassword(plain: string, hash: string): Promise<boolean> {
  const params = parseHash(hash);
  if (params === null) return Promise.resolve(false);

  const { N, r, p, salt, expected } = params;

  return new Promise((resolve, reject) => {
    scrypt(
      plain,
      salt,
      expected.length,
      { N, r, p, maxmem: SCRYPT_MAXMEM },
      (err, derivedKey) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(timingSafeEqual(derivedKey, expected));
      },
    );
  });
}

// ── Internal ─────────────────────────────────────────────────────

function parseHash(hash: string): ScryptParams | null {
  const parts = hash.split('$');
  // parts: ['', 'scrypt', N, r, p, salt, hash]
  if (parts.length !== 7 || parts[0] !== '' || parts[1] !== 'scrypt') {
    return null;
  }

  const [, , rawN, rawR, rawP, rawSalt, rawHash] = parts;
  if (
    rawN === undefined ||
    rawR === undefined ||
    rawP === undefined ||
    rawSalt === undefined ||
    rawHash === undefined
  ) {
    return null;
  }

  const N = Number(rawN);
  const r = Number(rawR);
  const p = Number(rawP);

  if (!isPowerOfTwo(N) || N > MAX_SCRYPT_COST) return null;
  if (!Number.isInteger(r) || r < 1 || r > MAX_SCRYPT_BLOCK_SIZE) return null;
  if (!Number.isInteger(p) || p < 1 || p > MAX_SCRYPT_PARALLELIZATION) return null;

  const salt = Buffer.from(rawSalt, 'base64');
  const expected = Buffer.from(rawHash, 'base64');
  if (salt.length === 0 || expected.length === 0) return null;

  return { N, r, p, salt, expected };
}

function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 1 && (n & (n - 1)) === 0;
}
