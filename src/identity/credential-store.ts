import Database from 'better-sqlite3';
import type { GenServerBehavior, GenServerRef } from '@hamicek/noex';
import { GenServer } from '@hamicek/noex';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { ErrorCode } from '../codes.js';
import { DndServerError } from '../errors.js';
import { Role, isRole, type Account, type AccountInfo } from './identity-types.js';

// ── Schema ────────────────────────────────────────────────────────

const SCHEMA_VERSION = 1;

const MIGRATIONS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS accounts (
    username TEXT PRIMARY KEY NOT NULL CHECK (length(username) > 0),
    password_hash TEXT NOT NULL,
    role TEXT NOT NULL,
    created_at INTEGER NOT NULL
  )`,
];

interface AccountRow {
  readonly username: string;
  readonly password_hash: string;
  readonly role: string;
  readonly created_at: number;
}

// ── State & Messages ──────────────────────────────────────────────

interface StoreState {
  readonly db: Database.Database;
  readonly logger: Logger;
}

export type StoreCall =
  | { readonly type: 'create'; readonly account: Account }
  | { readonly type: 'get'; readonly username: string }
  | { readonly type: 'list' };

export type StoreReply =
  | { readonly kind: 'account'; readonly account: Account }
  | { readonly kind: 'none' }
  | { readonly kind: 'accounts'; readonly accounts: readonly AccountInfo[] }
  | {
      readonly kind: 'error';
      readonly code: typeof ErrorCode.CONFLICT | typeof ErrorCode.STORAGE_UNAVAILABLE;
      readonly message: string;
    };

type StoreRef = GenServerRef<StoreState, StoreCall, never, StoreReply>;

export interface CredentialStoreOptions {
  readonly logger?: Logger;
}

// ── CredentialStore ───────────────────────────────────────────────

/**
 * Accounts table over an embedded SQLite database.
 *
 * The connection is owned by a single GenServer: every read and write is a
 * call into its mailbox, so operations run one at a time in arrival order
 * and never interleave inside a transaction.
 */
export class CredentialStore {
  readonly #ref: StoreRef;
  readonly #logger: Logger;
  #open = true;

  private constructor(ref: StoreRef, logger: Logger) {
    this.#ref = ref;
    this.#logger = logger;
  }

  /**
   * Opens (creating if needed) the database at `path` and migrates it.
   * Pass ':memory:' for a throwaway database.
   */
  static async open(
    path: string,
    options: CredentialStoreOptions = {},
  ): Promise<CredentialStore> {
    const logger = (options.logger ?? silentLogger()).child({
      component: 'credential-store',
    });

    let db: Database.Database | undefined;
    try {
      db = new Database(path);
      if (path !== ':memory:') {
        db.pragma('journal_mode = WAL');
      }
      migrate(db);
    } catch (error) {
      db?.close();
      logger.error({ err: error, path }, 'Failed to open credential database');
      throw new DndServerError(
        ErrorCode.STORAGE_UNAVAILABLE,
        'Credential database is unavailable',
      );
    }

    const ref = await GenServer.start(createStoreBehavior(db, logger));
    logger.debug({ path }, 'Credential store ready');
    return new CredentialStore(ref, logger);
  }

  /** Inserts a new account. Fails with CONFLICT if the username is taken. */
  async createAccount(
    username: string,
    passwordHash: string,
    role: Role = Role.Player,
  ): Promise<Account> {
    if (username.length === 0) {
      throw new DndServerError(ErrorCode.VALIDATION_ERROR, 'Username must not be empty');
    }

    const reply = await this.#call({
      type: 'create',
      account: { username, passwordHash, role, createdAt: Date.now() },
    });
    if (reply.kind !== 'account') throw unexpectedReply(reply.kind);
    return reply.account;
  }

  /** Looks up an account by exact username. Returns null when absent. */
  async getAccount(username: string): Promise<Account | null> {
    const reply = await this.#call({ type: 'get', username });
    if (reply.kind === 'none') return null;
    if (reply.kind !== 'account') throw unexpectedReply(reply.kind);
    return reply.account;
  }

  /** All accounts, oldest first, without password hashes. */
  async listAccounts(): Promise<readonly AccountInfo[]> {
    const reply = await this.#call({ type: 'list' });
    if (reply.kind !== 'accounts') throw unexpectedReply(reply.kind);
    return reply.accounts;
  }

  get isOpen(): boolean {
    return this.#open;
  }

  /** Stops the gate and closes the database connection. */
  async close(): Promise<void> {
    if (!this.#open) return;
    this.#open = false;
    await GenServer.stop(this.#ref, 'normal');
  }

  async #call(
    msg: StoreCall,
  ): Promise<Exclude<StoreReply, { readonly kind: 'error' }>> {
    if (!this.#open) {
      throw new DndServerError(
        ErrorCode.STORAGE_UNAVAILABLE,
        'Credential database is closed',
      );
    }

    let reply: StoreReply;
    try {
      reply = await GenServer.call(this.#ref, msg);
    } catch (error) {
      this.#logger.error({ err: error, op: msg.type }, 'Credential store call failed');
      throw new DndServerError(
        ErrorCode.STORAGE_UNAVAILABLE,
        'Credential database is unavailable',
      );
    }

    if (reply.kind === 'error') {
      throw new DndServerError(reply.code, reply.message);
    }
    return reply;
  }
}

// ── Behavior ──────────────────────────────────────────────────────

function createStoreBehavior(
  db: Database.Database,
  logger: Logger,
): GenServerBehavior<StoreState, StoreCall, never, StoreReply> {
  const insert = db.prepare<[string, string, string, number]>(
    'INSERT INTO accounts (username, password_hash, role, created_at) VALUES (?, ?, ?, ?)',
  );
  const selectOne = db.prepare<[string], AccountRow>(
    'SELECT username, password_hash, role, created_at FROM accounts WHERE username = ?',
  );
  const selectAll = db.prepare<[], AccountRow>(
    'SELECT username, password_hash, role, created_at FROM accounts ORDER BY created_at, username',
  );

  const insertAccount = db.transaction((account: Account) => {
    insert.run(account.username, account.passwordHash, account.role, account.createdAt);
  });

  return {
    init(): StoreState {
      return { db, logger };
    },

    handleCall(msg: StoreCall, state: StoreState): [StoreReply, StoreState] {
      try {
        switch (msg.type) {
          case 'create':
            insertAccount(msg.account);
            return [{ kind: 'account', account: msg.account }, state];
          case 'get': {
            const row = selectOne.get(msg.username);
            return [
              row === undefined ? { kind: 'none' } : { kind: 'account', account: fromRow(row) },
              state,
            ];
          }
          case 'list':
            return [
              {
                kind: 'accounts',
                accounts: selectAll.all().map((row) => {
                  const { username, role, createdAt } = fromRow(row);
                  return { username, role, createdAt };
                }),
              },
              state,
            ];
        }
      } catch (error) {
        return [toErrorReply(error, msg, state.logger), state];
      }
    },

    handleCast(_msg: never, state: StoreState): StoreState {
      return state;
    },

    terminate(_reason, state): void {
      if (state.db.open) {
        state.db.close();
      }
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────────

function migrate(db: Database.Database): void {
  const current = db.pragma('user_version', { simple: true });
  const version = typeof current === 'number' ? current : 0;
  if (version >= SCHEMA_VERSION) return;

  db.transaction(() => {
    for (const sql of MIGRATIONS.slice(version)) {
      db.exec(sql);
    }
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  })();
}

function fromRow(row: AccountRow): Account {
  if (!isRole(row.role)) {
    throw new Error(`Account "${row.username}" has unknown role "${row.role}"`);
  }
  return {
    username: row.username,
    passwordHash: row.password_hash,
    role: row.role,
    createdAt: row.created_at,
  };
}

function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toErrorReply(error: unknown, msg: StoreCall, logger: Logger): StoreReply {
  const code = sqliteCode(error);

  if (msg.type === 'create' && code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    return {
      kind: 'error',
      code: ErrorCode.CONFLICT,
      message: `Account "${msg.account.username}" already exists`,
    };
  }

  logger.error({ err: error, op: msg.type, sqliteCode: code }, 'Credential store operation failed');
  return {
    kind: 'error',
    code: ErrorCode.STORAGE_UNAVAILABLE,
    message: 'Credential database is unavailable',
  };
}

function unexpectedReply(kind: string): DndServerError {
  return new DndServerError(
    ErrorCode.INTERNAL_ERROR,
    `Unexpected credential store reply: ${kind}`,
  );
}
