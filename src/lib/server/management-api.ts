/**
 * Management API for TLS-ALPN-01 challenges
 *
 * JSON-over-HTTP endpoints test orchestration uses to register challenges on a
 * running server:
 *
 * POST /add-tlsalpn01 {"host": "...", "content": "<key authorization>"}
 * POST /del-tlsalpn01 {"host": "..."}
 * POST /get-tlsalpn01 {"host": "..."} -> {"host", "content", "found"}
 */

import { getRequestListener } from '@hono/node-server';
import { Hono, type Context } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { createServer, type Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import type { z } from 'zod';

import { MANAGEMENT_BODY_MAX_BYTES } from '../constants/defaults.js';
import { ManagementApiError, ServerStateError } from '../errors/errors.js';
import type { ChallengeRegistry } from '../registry/challenge-registry.js';
import { formatAddress, parseListenAddress, type ListenAddress } from '../utils/address.js';
import { debugManagement } from '../utils/debug.js';
import { AddTlsAlpn01Body, HostBody, parseBody } from './schemas.js';

export const MANAGEMENT_ROUTES = {
  addTlsAlpn01: '/add-tlsalpn01',
  deleteTlsAlpn01: '/del-tlsalpn01',
  getTlsAlpn01: '/get-tlsalpn01',
} as const;

export interface ManagementApiOptions {
  registry: ChallengeRegistry;
  /** Largest accepted request body. Defaults to 64 KiB. */
  maxBodyBytes?: number;
}

/** Body of POST /get-tlsalpn01 responses */
export interface TlsAlpn01Lookup {
  host: string;
  content: string;
  found: boolean;
}

async function readBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  const text = await c.req.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw ManagementApiError.invalidRequest('request body is not valid JSON');
  }

  const parsed = parseBody(schema, body);
  if (!parsed.success) {
    throw ManagementApiError.invalidRequest(parsed.error);
  }
  return parsed.data;
}

/** Hono app serving the management routes against `registry` */
export function createManagementApp(
  registry: ChallengeRegistry,
  maxBodyBytes: number = MANAGEMENT_BODY_MAX_BYTES,
): Hono {
  const app = new Hono();

  app.use('*', async (c, next) => {
    debugManagement('%s %s', c.req.method, c.req.path);
    await next();
  });
  app.use(
    '*',
    bodyLimit({
      maxSize: maxBodyBytes,
      onError: (c) => c.json({ error: `request body exceeds ${maxBodyBytes} bytes` }, 413),
    }),
  );

  app.post(MANAGEMENT_ROUTES.addTlsAlpn01, async (c) => {
    const { host, content } = await readBody(c, AddTlsAlpn01Body);
    registry.add(host, content);
    return c.json({});
  });

  app.post(MANAGEMENT_ROUTES.deleteTlsAlpn01, async (c) => {
    const { host } = await readBody(c, HostBody);
    registry.delete(host);
    return c.json({});
  });

  app.post(MANAGEMENT_ROUTES.getTlsAlpn01, async (c) => {
    const { host } = await readBody(c, HostBody);
    const { keyAuthorization, found } = registry.get(host);
    const lookup: TlsAlpn01Lookup = { host, content: keyAuthorization, found };
    return c.json(lookup);
  });

  // Known paths reached with any other method
  for (const route of Object.values(MANAGEMENT_ROUTES)) {
    app.all(route, (c) => {
      c.header('Allow', 'POST');
      return c.json({ error: `method ${c.req.method} not allowed` }, 405);
    });
  }

  app.notFound((c) => c.json({ error: `unknown path ${c.req.path}` }, 404));

  app.onError((error, c) => {
    if (error instanceof ManagementApiError) {
      debugManagement('rejected %s: %s', c.req.path, error.message);
      return c.json({ error: error.message }, 400);
    }
    debugManagement('request failed: %s', error.message);
    return c.json({ error: 'internal error' }, 500);
  });

  return app;
}

export class ManagementApi {
  readonly app: Hono;
  private readonly server: HttpServer;

  constructor(options: ManagementApiOptions) {
    this.app = createManagementApp(options.registry, options.maxBodyBytes);
    this.server = createServer(getRequestListener(this.app.fetch));
  }

  get listening(): boolean {
    return this.server.listening;
  }

  /** @throws {ServerStateError} When already listening or the address is invalid */
  async listen(address: string | ListenAddress): Promise<AddressInfo> {
    if (this.server.listening) {
      throw ServerStateError.alreadyListening();
    }
    const { host, port } = typeof address === 'string' ? parseListenAddress(address) : address;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      this.server.once('error', onError);
      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        resolve();
      });
    });

    const bound = this.address();
    debugManagement('listening on %s', formatAddress(bound.address, bound.port));
    return bound;
  }

  /** @throws {ServerStateError} When not listening */
  address(): AddressInfo {
    const bound = this.server.address();
    if (!bound || typeof bound === 'string') {
      throw ServerStateError.notListening();
    }
    return bound;
  }

  /** Stop listening; idle keep-alive connections are closed right away */
  async close(): Promise<void> {
    if (!this.server.listening) {
      throw ServerStateError.notListening();
    }
    const closed = new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
    this.server.closeIdleConnections();
    await closed;
  }
}
