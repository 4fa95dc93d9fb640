import { stat, unlink } from 'node:fs/promises';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { ErrorCode } from '../codes.js';
import { DndServerError } from '../errors.js';
import type { CredentialStore } from '../identity/credential-store.js';
import { hashPassword } from '../identity/password-hasher.js';
import { Role } from '../identity/identity-types.js';
import { DEFAULT_ROOT_USERNAME, readRootDescriptor } from './root-descriptor.js';

export interface BootstrapOptions {
  readonly store: CredentialStore;
  readonly descriptorPath: string;
  /** Account looked up when the descriptor cannot be read. Default: 'root'. */
  readonly rootUsername?: string;
  /** Delete the descriptor once the root account has been created. Default: false. */
  readonly removeDescriptor?: boolean;
  readonly logger?: Logger;
}

export type BootstrapResult =
  | { readonly status: 'created'; readonly username: string }
  | { readonly status: 'existing'; readonly username: string };

/**
 * Makes sure the root account exists before the server accepts connections.
 *
 * Idempotent: once the root account exists the descriptor is never consulted
 * again. Without a root account, a missing or malformed descriptor is fatal
 * (BOOTSTRAP_FAILURE).
 */
export async function bootstrapRoot(options: BootstrapOptions): Promise<BootstrapResult> {
  const { store, descriptorPath } = options;
  const logger = (options.logger ?? silentLogger()).child({ component: 'bootstrap' });

  const descriptor = await readRootDescriptor(descriptorPath);
  const username = descriptor.ok
    ? descriptor.credentials.name
    : (options.rootUsername ?? DEFAULT_ROOT_USERNAME);

  if (descriptor.ok) {
    await warnIfExposed(descriptorPath, logger);
  }

  const existing = await store.getAccount(username);
  if (existing !== null) {
    if (existing.role !== Role.Root) {
      throw new DndServerError(
        ErrorCode.BOOTSTRAP_FAILURE,
        `Account "${username}" exists but does not have the root role`,
      );
    }
    if (!descriptor.ok) {
      logger.warn(
        { path: descriptorPath, reason: descriptor.reason },
        'Root descriptor unusable; root account already exists',
      );
    }
    logger.info({ username }, 'Root account present');
    return { status: 'existing', username };
  }

  if (!descriptor.ok) {
    throw new DndServerError(
      ErrorCode.BOOTSTRAP_FAILURE,
      `No root account and no usable root descriptor: ${descriptor.message}`,
      { path: descriptorPath, reason: descriptor.reason },
    );
  }

  const passwordHash = await hashPassword(descriptor.credentials.pass);
  try {
    await store.createAccount(username, passwordHash, Role.Root);
  } catch (error) {
    // Another process created it between lookup and insert.
    if (error instanceof DndServerError && error.code === ErrorCode.CONFLICT) {
      logger.info({ username }, 'Root account created concurrently');
      return { status: 'existing', username };
    }
    throw error;
  }

  logger.info({ username }, 'Root account created');

  if (options.removeDescriptor === true) {
    try {
      await unlink(descriptorPath);
      logger.info({ path: descriptorPath }, 'Root descriptor removed');
    } catch (error) {
      logger.warn({ err: error, path: descriptorPath }, 'Failed to remove root descriptor');
    }
  }

  return { status: 'created', username };
}

async function warnIfExposed(path: string, logger: Logger): Promise<void> {
  try {
    const { mode } = await stat(path);
    if ((mode & 0o077) !== 0) {
      logger.warn(
        { path, mode: (mode & 0o777).toString(8) },
        'Root descriptor is readable by group or others',
      );
    }
  } catch (error) {
    logger.debug({ err: error, path }, 'Cannot stat root descriptor');
  }
}
