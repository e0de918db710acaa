/**
 * In-process TLS and TCP clients for server tests
 */

import { X509Certificate } from '@peculiar/x509';
import { connect as connectTcp } from 'net';
import type { Duplex } from 'stream';
import { connect as connectTls, type TLSSocket } from 'tls';

import { toArrayBuffer } from '../../src/lib/utils/bytes.js';

export interface TlsHandshakeOptions {
  servername?: string;
  ALPNProtocols?: string[];
}

export interface TlsHandshakeResult {
  socket: TLSSocket;
  alpnProtocol: string;
  certificate: X509Certificate;
}

/** Complete a TLS handshake against 127.0.0.1:port and keep the socket open */
export function tlsHandshake(port: number, options: TlsHandshakeOptions = {}): Promise<TlsHandshakeResult> {
  return new Promise((resolve, reject) => {
    const socket = connectTls({
      host: '127.0.0.1',
      port,
      rejectUnauthorized: false,
      ...(options.servername ? { servername: options.servername } : {}),
      ...(options.ALPNProtocols ? { ALPNProtocols: options.ALPNProtocols } : {}),
    });
    socket.once('error', reject);
    socket.once('secureConnect', () => {
      socket.off('error', reject);
      socket.on('error', () => undefined);
      const raw = socket.getPeerCertificate(true).raw;
      resolve({
        socket,
        alpnProtocol: socket.alpnProtocol || '',
        certificate: new X509Certificate(toArrayBuffer(raw)),
      });
    });
  });
}

/** Handshake, then close the connection */
export async function fetchCertificate(
  port: number,
  options: TlsHandshakeOptions = {},
): Promise<Omit<TlsHandshakeResult, 'socket'>> {
  const { socket, alpnProtocol, certificate } = await tlsHandshake(port, options);
  socket.destroy();
  return { alpnProtocol, certificate };
}

/** Send `payload` over an open socket and collect everything until the peer closes */
export function exchange(socket: Duplex, payload: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.once('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    socket.once('error', reject);
    socket.write(payload);
  });
}

/** Plain TCP exchange: connect, send, read until close */
export function tcpExchange(port: number, payload: string): Promise<string> {
  const socket = connectTcp({ host: '127.0.0.1', port });
  return exchange(socket, payload);
}
