/**
 * TLS-only server for TLS-ALPN-01 validation
 *
 * - Every connection must open with a TLS ClientHello; plaintext clients get a
 *   400 notice and are disconnected
 * - No certificate is configured up front: the selector picks one per handshake
 * - Rejected handshakes receive a fatal TLS alert
 * - Completed handshakes are served as HTTP/1.1 with keep-alive disabled
 */

import {
  createServer as createHttpServer,
  type IncomingMessage,
  type RequestListener,
  type Server as HttpServer,
  type ServerResponse,
} from 'http';
import {
  createServer as createNetServer,
  type AddressInfo,
  type Server as NetServer,
  type Socket,
} from 'net';
import { createSecureContext, TLSSocket } from 'tls';

import { CLIENT_HELLO_MAX_BYTES, CONNECTION_TIMEOUT_MS } from '../constants/defaults.js';
import { ACME_TLS_1_PROTOCOL, SERVER_ALPN_PROTOCOLS } from '../constants/protocol.js';
import { SERVER_ERROR, TLS_ALERT } from '../errors/codes.js';
import { ClientHelloError, HandshakeError, ServerStateError } from '../errors/errors.js';
import type { CertificateBundle } from '../types/certificate.js';
import { formatAddress, parseListenAddress, type ListenAddress } from '../utils/address.js';
import { debugTls } from '../utils/debug.js';
import { TypedEventEmitter } from '../utils/typed-emitter.js';
import { logWarn } from '../../logger.js';
import { encodeFatalAlert, PLAINTEXT_REJECTION } from './alerts.js';
import { isAcmeTlsAlpnHello, type CertificateSelector } from './certificate-issuer.js';
import { ClientHelloReader, type ClientHelloInfo } from './client-hello.js';

export interface TlsAlpnServerOptions {
  /** Picks the certificate for each handshake; rejecting aborts the handshake */
  selectCertificate: CertificateSelector;
  /** Handler for HTTP requests sent after a completed handshake. Defaults to a 404 responder. */
  handler?: RequestListener;
  /** Read/write inactivity timeout per connection. Defaults to 5 seconds. */
  timeoutMs?: number;
  /** Upper bound on buffered ClientHello bytes. Defaults to 16 KiB. */
  maxClientHelloBytes?: number;
  /** Protocols the server may select in ALPN negotiation. Defaults to acme-tls/1 and http/1.1. */
  alpnProtocols?: readonly string[];
}

/** A handshake that completed */
export interface HandshakeEvent {
  remoteAddress: string;
  serverName: string;
  protocols: string[];
  /** Whether a challenge certificate was presented */
  challenge: boolean;
  /** Negotiated ALPN protocol, empty when none */
  alpnProtocol: string;
}

/** A connection dropped before or during the handshake */
export interface HandshakeErrorEvent {
  remoteAddress: string;
  serverName: string;
  protocols: string[];
  error: Error;
}

export interface TlsAlpnServerEvents {
  listening: AddressInfo;
  handshake: HandshakeEvent;
  handshakeError: HandshakeErrorEvent;
  close: void;
}

interface ConnectionState {
  secured: boolean;
  activeRequests: number;
}

const NOT_FOUND_BODY = '404 page not found\n';

export const notFoundHandler: RequestListener = (_req, res) => {
  res.writeHead(404, {
    'Content-Type': 'text/plain; charset=utf-8',
    'Content-Length': Buffer.byteLength(NOT_FOUND_BODY),
  });
  res.end(NOT_FOUND_BODY);
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class TlsAlpnServer extends TypedEventEmitter<TlsAlpnServerEvents> {
  private readonly opts: Required<TlsAlpnServerOptions>;
  private readonly tcp: NetServer;
  private readonly http: HttpServer;
  private readonly connections = new Map<Socket, ConnectionState>();
  private drainWaiters: Array<() => void> = [];

  constructor(options: TlsAlpnServerOptions) {
    super();
    this.opts = {
      handler: notFoundHandler,
      timeoutMs: CONNECTION_TIMEOUT_MS,
      maxClientHelloBytes: CLIENT_HELLO_MAX_BYTES,
      alpnProtocols: SERVER_ALPN_PROTOCOLS,
      ...options,
    };

    this.http = createHttpServer((req, res) => this.handleRequest(req, res));
    this.tcp = createNetServer((socket) => this.accept(socket));
  }

  get listening(): boolean {
    return this.tcp.listening;
  }

  /** Number of open connections, including ones still in the handshake */
  get connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Bind the TCP listener and start accepting TLS connections.
   *
   * @param address - `[host]:port` string or parsed address; port 0 picks a free port
   * @throws {ServerStateError} When already listening or the address is invalid
   */
  async listen(address: string | ListenAddress): Promise<AddressInfo> {
    if (this.tcp.listening) {
      throw ServerStateError.alreadyListening();
    }
    const { host, port } = typeof address === 'string' ? parseListenAddress(address) : address;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      this.tcp.once('error', onError);
      this.tcp.listen(port, host, () => {
        this.tcp.off('error', onError);
        resolve();
      });
    });

    const bound = this.address();
    debugTls('listening on %s', formatAddress(bound.address, bound.port));
    this.emit('listening', bound);
    return bound;
  }

  /** @throws {ServerStateError} When not listening */
  address(): AddressInfo {
    const bound = this.tcp.address();
    if (!bound || typeof bound === 'string') {
      throw ServerStateError.notListening();
    }
    return bound;
  }

  /**
   * Stop accepting connections and wait for open ones to finish. Idle HTTP
   * connections close immediately; handshakes and requests in progress run to
   * completion unless `signal` aborts, which destroys whatever remains.
   *
   * @throws {ServerStateError} When not listening
   */
  async shutdown(signal?: AbortSignal): Promise<void> {
    if (!this.tcp.listening) {
      throw ServerStateError.notListening();
    }

    this.tcp.close((error) => {
      if (error) debugTls('listener close failed: %s', error.message);
    });
    for (const [socket, state] of this.connections) {
      if (state.secured && state.activeRequests === 0) {
        socket.destroy();
      }
    }

    const drained = this.waitForDrain();
    const forceClose = (): void => {
      if (this.connections.size > 0) {
        logWarn('shutdown aborted, destroying %d open connection(s)', this.connections.size);
      }
      for (const socket of this.connections.keys()) {
        socket.destroy();
      }
    };

    if (signal?.aborted) {
      forceClose();
    } else {
      signal?.addEventListener('abort', forceClose, { once: true });
    }

    try {
      await drained;
    } finally {
      signal?.removeEventListener('abort', forceClose);
    }

    debugTls('shut down');
    this.emit('close');
  }

  private accept(socket: Socket): void {
    const remoteAddress = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    this.track(socket);
    socket.setTimeout(this.opts.timeoutMs, () => {
      debugTls('%s timed out before completing a ClientHello', remoteAddress);
      socket.destroy();
    });
    socket.on('error', (error) => debugTls('%s connection error: %s', remoteAddress, error.message));

    const reader = new ClientHelloReader(this.opts.maxClientHelloBytes);
    const onData = (chunk: Buffer): void => {
      let hello: ClientHelloInfo | undefined;
      try {
        hello = reader.push(chunk);
      } catch (error) {
        socket.off('data', onData);
        this.rejectConnection(socket, remoteAddress, toError(error));
        return;
      }
      if (!hello) {
        return;
      }

      socket.off('data', onData);
      socket.pause();
      socket.unshift(reader.buffered());
      this.handshake(socket, remoteAddress, hello).catch((error: unknown) => {
        debugTls('%s handshake setup failed: %s', remoteAddress, toError(error).message);
        socket.destroy();
      });
    };
    socket.on('data', onData);
  }

  private rejectConnection(socket: Socket, remoteAddress: string, error: Error): void {
    debugTls('%s rejected: %s', remoteAddress, error.message);
    this.emit('handshakeError', { remoteAddress, serverName: '', protocols: [], error });

    if (error instanceof ClientHelloError && error.code === SERVER_ERROR.notTls) {
      socket.end(PLAINTEXT_REJECTION);
    } else {
      socket.destroy();
    }
  }

  private async handshake(socket: Socket, remoteAddress: string, hello: ClientHelloInfo): Promise<void> {
    const { serverName, protocols } = hello;

    let bundle: CertificateBundle;
    try {
      bundle = await this.opts.selectCertificate({ serverName, protocols });
    } catch (caught) {
      const error = toError(caught);
      debugTls('%s handshake for %s rejected: %s', remoteAddress, serverName || '<no sni>', error.message);
      this.emit('handshakeError', { remoteAddress, serverName, protocols, error });
      if (!socket.destroyed) {
        const alert = error instanceof HandshakeError ? error.alert : TLS_ALERT.internalError;
        // Drain whatever the client still sends so the close completes
        socket.end(encodeFatalAlert(alert));
        socket.resume();
      }
      return;
    }

    if (socket.destroyed) {
      return;
    }

    const secureContext = createSecureContext({
      cert: bundle.certPem,
      key: bundle.keyPem,
      minVersion: 'TLSv1.2',
    });
    const challenge = isAcmeTlsAlpnHello(protocols);
    const alpnProtocols = this.negotiableProtocols(protocols, challenge);
    const tlsSocket = new TLSSocket(socket, {
      isServer: true,
      secureContext,
      ...(alpnProtocols.length > 0 ? { ALPNProtocols: alpnProtocols } : {}),
    });

    // The TLS socket owns the connection from here on
    const state = this.connections.get(socket) ?? { secured: false, activeRequests: 0 };
    this.track(tlsSocket, state);
    this.untrack(socket);
    socket.setTimeout(0);
    tlsSocket.setTimeout(this.opts.timeoutMs, () => {
      debugTls('%s idle timeout', remoteAddress);
      tlsSocket.destroy();
    });
    tlsSocket.once('close', () => {
      socket.destroy();
    });
    tlsSocket.on('error', (error: Error) => {
      debugTls('%s tls error: %s', remoteAddress, error.message);
      if (!state.secured) {
        this.emit('handshakeError', { remoteAddress, serverName, protocols, error });
      }
    });
    tlsSocket.once('secure', () => {
      state.secured = true;
      const alpnProtocol = tlsSocket.alpnProtocol || '';
      debugTls(
        '%s handshake complete for %s (alpn=%s, challenge=%s)',
        remoteAddress,
        serverName || '<no sni>',
        alpnProtocol || '<none>',
        challenge,
      );
      this.emit('handshake', { remoteAddress, serverName, protocols, challenge, alpnProtocol });
      this.http.emit('connection', tlsSocket);
    });
  }

  /**
   * ALPN list for one connection. acme-tls/1 is only ever negotiated alongside
   * a challenge certificate, and an offer with no overlap proceeds without ALPN
   * instead of failing with no_application_protocol.
   */
  private negotiableProtocols(offered: readonly string[], challenge: boolean): string[] {
    if (challenge) {
      return this.opts.alpnProtocols.includes(ACME_TLS_1_PROTOCOL) ? [ACME_TLS_1_PROTOCOL] : [];
    }
    return this.opts.alpnProtocols.filter(
      (protocol) => protocol !== ACME_TLS_1_PROTOCOL && offered.includes(protocol),
    );
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const state = this.connections.get(req.socket);
    if (state) {
      state.activeRequests++;
      res.once('close', () => {
        state.activeRequests--;
      });
    }

    res.setHeader('Connection', 'close');
    this.opts.handler(req, res);
  }

  private track(socket: Socket, state: ConnectionState = { secured: false, activeRequests: 0 }): void {
    this.connections.set(socket, state);
    socket.once('close', () => this.untrack(socket));
  }

  private untrack(socket: Socket): void {
    if (!this.connections.delete(socket) || this.connections.size > 0) {
      return;
    }
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  private waitForDrain(): Promise<void> {
    if (this.connections.size === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.drainWaiters.push(resolve));
  }
}
