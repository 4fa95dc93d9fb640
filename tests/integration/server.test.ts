import { mkdtempSync, readFileSync, rmSync, writeFileSync, unlinkSync } from 'node:fs';
import { request as httpsRequest } from 'node:https';
import type { IncomingHttpHeaders } from 'node:http';
import { TLSSocket } from 'node:tls';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DndServer, DndServerError, silentLogger } from '../../src/index.js';
import type { ServerConfig } from '../../src/config.js';

// ── Helpers ──────────────────────────────────────────────────────

const fixture = (path: string): string =>
  fileURLToPath(new URL(`../fixtures/${path}`, import.meta.url));

const CERT_PATH = fixture('tls/localhost.crt');
const KEY_PATH = fixture('tls/localhost.key');
const OTHER_KEY_PATH = fixture('tls/other.key');
const CLIENT_PATH = fixture('client');

interface HttpsResponse {
  status: number;
  headers: IncomingHttpHeaders;
  body: string;
  /** SHA-256 fingerprint of the certificate the server presented. */
  fingerprint256: string;
}

function send(
  port: number,
  path: string,
  options: {
    method?: string;
    body?: unknown;
    cookie?: string;
    /** Holds back the second half of the body until this settles. */
    bodyHeldUntil?: Promise<void>;
  } = {},
): Promise<HttpsResponse> {
  const payload = options.body !== undefined ? JSON.stringify(options.body) : undefined;
  return new Promise((resolve, reject) => {
    const req = httpsRequest(
      {
        host: '127.0.0.1',
        port,
        path,
        method: options.method ?? 'GET',
        servername: 'localhost',
        rejectUnauthorized: false,
        agent: false,
        headers: {
          ...(payload !== undefined
            ? { 'content-type': 'application/json', 'content-length': Buffer.byteLength(payload) }
            : {}),
          ...(options.cookie !== undefined ? { cookie: options.cookie } : {}),
        },
      },
      (res) => {
        const socket = res.socket;
        const fingerprint256 =
          socket instanceof TLSSocket ? socket.getPeerCertificate().fingerprint256 : '';
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () =>
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks).toString('utf-8'),
            fingerprint256,
          }),
        );
        res.on('error', reject);
      },
    );
    req.on('error', reject);
    if (payload !== undefined && options.bodyHeldUntil !== undefined) {
      const half = Math.floor(payload.length / 2);
      req.write(payload.slice(0, half));
      options.bodyHeldUntil.then(() => req.end(payload.slice(half)), reject);
    } else {
      req.end(payload);
    }
  });
}

function sessionCookie(res: HttpsResponse): string {
  const header = res.headers['set-cookie']?.find((c) => c.startsWith('login-token='));
  if (header === undefined) throw new Error('no session cookie');
  return header.split(';')[0] ?? '';
}

// ── Tests ────────────────────────────────────────────────────────

describe('DndServer', () => {
  let dir: string;
  let descriptorPath: string;
  let server: DndServer | undefined;

  function baseConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
    return {
      tls: { certPath: CERT_PATH, keyPath: KEY_PATH },
      port: 0,
      host: '127.0.0.1',
      databasePath: ':memory:',
      rootDescriptorPath: descriptorPath,
      clientPath: CLIENT_PATH,
      logger: silentLogger(),
      ...overrides,
    };
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'dnd-server-'));
    descriptorPath = join(dir, 'root.toml');
    writeFileSync(descriptorPath, '[credentials]\nname = "root"\npass = "test-secret"\n', {
      mode: 0o600,
    });
  });

  afterEach(async () => {
    await server?.stop();
    server = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  describe('start', () => {
    it('serves the API over TLS with the configured certificate', async () => {
      server = await DndServer.start(baseConfig());

      const res = await send(server.port, '/v1/version');

      expect(res.status).toBe(200);
      expect(JSON.parse(res.body)).toEqual({ name: 'dnd-server', version: '0.1.0' });
      expect(res.fingerprint256).toBe(server.certificate.fingerprint256);
      expect(server.isRunning).toBe(true);
      expect(server.port).toBeGreaterThan(0);
    });

    it('creates the root account from the descriptor', async () => {
      server = await DndServer.start(baseConfig());
      expect(server.bootstrap).toEqual({ status: 'created', username: 'root' });

      const login = await send(server.port, '/v1/login', {
        method: 'POST',
        body: { username: 'root', password: 'test-secret' },
      });
      expect(login.status).toBe(200);

      const whoami = await send(server.port, '/v1/whoami', { cookie: sessionCookie(login) });
      expect(whoami.status).toBe(200);
      expect(JSON.parse(whoami.body)).toMatchObject({ username: 'root', role: 'root' });
    });

    it('serves static client assets', async () => {
      server = await DndServer.start(baseConfig());

      const res = await send(server.port, '/');

      expect(res.status).toBe(200);
      expect(res.body).toContain('<title>dnd client</title>');
    });

    it('accepts inline PEM material', async () => {
      server = await DndServer.start(
        baseConfig({
          tls: { cert: readFileSync(CERT_PATH, 'utf-8'), key: readFileSync(KEY_PATH, 'utf-8') },
        }),
      );
      expect((await send(server.port, '/v1/version')).status).toBe(200);
    });

    it('refuses to start when the key does not match the certificate', async () => {
      const error = await DndServer.start(
        baseConfig({ tls: { certPath: CERT_PATH, keyPath: OTHER_KEY_PATH } }),
      ).then(
        () => null,
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(DndServerError);
      expect(error).toHaveProperty('code', 'TLS_CONFIG_ERROR');
    });

    it('refuses to start without a descriptor or an existing root', async () => {
      unlinkSync(descriptorPath);

      await expect(DndServer.start(baseConfig())).rejects.toHaveProperty(
        'code',
        'BOOTSTRAP_FAILURE',
      );
    });

    it('reuses the root account stored on disk', async () => {
      const databasePath = join(dir, 'data', 'dnd.db');
      const first = await DndServer.start(baseConfig({ databasePath }));
      await first.stop();
      unlinkSync(descriptorPath);

      server = await DndServer.start(baseConfig({ databasePath }));

      expect(server.bootstrap).toEqual({ status: 'existing', username: 'root' });
      const login = await send(server.port, '/v1/login', {
        method: 'POST',
        body: { username: 'root', password: 'test-secret' },
      });
      expect(login.status).toBe(200);
    });
  });

  describe('stop', () => {
    it('stops accepting connections', async () => {
      server = await DndServer.start(baseConfig());
      const port = server.port;

      await server.stop();

      expect(server.isRunning).toBe(false);
      await expect(send(port, '/v1/version')).rejects.toHaveProperty('code', 'ECONNREFUSED');
    });

    it('is idempotent', async () => {
      server = await DndServer.start(baseConfig());

      await server.stop();
      await server.stop({ gracePeriodMs: 100 });

      expect(server.isRunning).toBe(false);
    });

    it('waits for in-flight requests within the grace period', async () => {
      server = await DndServer.start(baseConfig());
      const port = server.port;

      const pending = send(port, '/v1/login', {
        method: 'POST',
        body: { username: 'root', password: 'test-secret' },
      });
      // Let the request reach the handler before stopping.
      await new Promise((resolve) => setTimeout(resolve, 50));
      await server.stop({ gracePeriodMs: 5_000 });

      expect((await pending).status).toBe(200);
    });

    it('lets an in-flight request finish when stopped without options', async () => {
      server = await DndServer.start(baseConfig());
      let releaseBody: () => void = () => undefined;
      const bodyHeldUntil = new Promise<void>((resolve) => {
        releaseBody = resolve;
      });

      const pending = send(server.port, '/v1/login', {
        method: 'POST',
        body: { username: 'root', password: 'test-secret' },
        bodyHeldUntil,
      });
      // The request head has arrived; its body is still incomplete.
      await new Promise((resolve) => setTimeout(resolve, 200));

      let stopped = false;
      const stopping = server.stop().then(() => {
        stopped = true;
      });
      await new Promise((resolve) => setTimeout(resolve, 100));
      expect(stopped).toBe(false);

      releaseBody();
      expect((await pending).status).toBe(200);
      await stopping;
      expect(stopped).toBe(true);
    });
  });
});
