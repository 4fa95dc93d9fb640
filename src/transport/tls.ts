import { readFile } from 'node:fs/promises';
import { X509Certificate, createPrivateKey, type KeyObject } from 'node:crypto';
import { createSecureContext } from 'node:tls';
import { ErrorCode } from '../codes.js';
import { DndServerError } from '../errors.js';

// ── Types ────────────────────────────────────────────────────────

/** Certificate chain and private key as PEM files on disk. */
export interface TlsFiles {
  readonly certPath: string;
  readonly keyPath: string;
}

/** Certificate chain and private key as inline PEM. */
export interface TlsMaterial {
  readonly cert: string;
  readonly key: string;
}

export type TlsSource = TlsFiles | TlsMaterial;

export interface CertificateSummary {
  readonly subject: string;
  readonly validFrom: Date;
  readonly validTo: Date;
  readonly fingerprint256: string;
}

function isTlsFiles(source: TlsSource): source is TlsFiles {
  return 'certPath' in source;
}

// ── Loading ──────────────────────────────────────────────────────

export async function loadTlsMaterial(source: TlsSource): Promise<TlsMaterial> {
  if (!isTlsFiles(source)) return source;

  const [cert, key] = await Promise.all([
    readPem(source.certPath, 'certificate'),
    readPem(source.keyPath, 'private key'),
  ]);
  return { cert, key };
}

async function readPem(path: string, what: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new DndServerError(
      ErrorCode.TLS_CONFIG_ERROR,
      `Cannot read TLS ${what} at ${path}`,
      { cause: error instanceof Error ? error.message : String(error) },
    );
  }
}

// ── Validation ───────────────────────────────────────────────────

/**
 * Checks that the leaf certificate parses, is inside its validity window at
 * `now`, and matches the private key. Throws TLS_CONFIG_ERROR otherwise.
 */
export function validateTlsMaterial(
  material: TlsMaterial,
  now: Date = new Date(),
): CertificateSummary {
  let certificate: X509Certificate;
  try {
    certificate = new X509Certificate(material.cert);
  } catch {
    throw new DndServerError(ErrorCode.TLS_CONFIG_ERROR, 'TLS certificate is not valid PEM');
  }

  let privateKey: KeyObject;
  try {
    privateKey = createPrivateKey(material.key);
  } catch {
    throw new DndServerError(ErrorCode.TLS_CONFIG_ERROR, 'TLS private key is not valid PEM');
  }

  const validFrom = new Date(certificate.validFrom);
  const validTo = new Date(certificate.validTo);

  if (now.getTime() < validFrom.getTime()) {
    throw new DndServerError(
      ErrorCode.TLS_CONFIG_ERROR,
      `TLS certificate is not valid before ${validFrom.toISOString()}`,
    );
  }
  if (now.getTime() > validTo.getTime()) {
    throw new DndServerError(
      ErrorCode.TLS_CONFIG_ERROR,
      `TLS certificate expired at ${validTo.toISOString()}`,
    );
  }

  if (!certificate.checkPrivateKey(privateKey)) {
    throw new DndServerError(
      ErrorCode.TLS_CONFIG_ERROR,
      'TLS private key does not match the certificate',
    );
  }

  try {
    createSecureContext({ cert: material.cert, key: material.key });
  } catch (error) {
    throw new DndServerError(
      ErrorCode.TLS_CONFIG_ERROR,
      'TLS certificate and key were rejected',
      { cause: error instanceof Error ? error.message : String(error) },
    );
  }

  return {
    subject: certificate.subject,
    validFrom,
    validTo,
    fingerprint256: certificate.fingerprint256,
  };
}
