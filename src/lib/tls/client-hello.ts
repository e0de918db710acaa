/**
 * TLS ClientHello inspection
 *
 * Certificate selection for TLS-ALPN-01 depends on both the SNI name and the
 * offered ALPN protocols. Node's SNICallback runs before ALPN is known, so the
 * server reads the ClientHello off the wire itself, picks a certificate, and
 * only then hands the buffered bytes to the TLS stack.
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8446#section-4.1.2 | RFC 8446 Section 4.1.2 - ClientHello}
 * @see {@link https://datatracker.ietf.org/doc/html/rfc6066#section-3 | RFC 6066 Section 3 - Server Name Indication}
 * @see {@link https://datatracker.ietf.org/doc/html/rfc7301#section-3.1 | RFC 7301 Section 3.1 - ALPN}
 */

import { CLIENT_HELLO_MAX_BYTES } from '../constants/defaults.js';
import { ClientHelloError } from '../errors/errors.js';
import type { ClientHelloSummary } from '../types/certificate.js';

export const CONTENT_TYPE_HANDSHAKE = 0x16;
export const HANDSHAKE_TYPE_CLIENT_HELLO = 0x01;
export const EXTENSION_SERVER_NAME = 0x0000;
export const EXTENSION_ALPN = 0x0010;

const RECORD_HEADER_LENGTH = 5;
const HANDSHAKE_HEADER_LENGTH = 4;
const MAX_RECORD_LENGTH = 16_384;
const NAME_TYPE_HOST_NAME = 0x00;

/**
 * Parsed ClientHello fields the server cares about
 */
export interface ClientHelloInfo extends ClientHelloSummary {
  /** legacy_version field, 0x0303 for TLS 1.2 and 1.3 clients */
  legacyVersion: number;
}

/** Bounds-checked cursor over a ClientHello body */
class ByteReader {
  private offset = 0;

  constructor(private readonly data: Buffer) {}

  get remaining(): number {
    return this.data.length - this.offset;
  }

  u8(field: string): number {
    this.require(1, field);
    return this.data[this.offset++];
  }

  u16(field: string): number {
    this.require(2, field);
    const value = this.data.readUInt16BE(this.offset);
    this.offset += 2;
    return value;
  }

  bytes(length: number, field: string): Buffer {
    this.require(length, field);
    const value = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  /** Opaque vector with a one-byte length prefix */
  vector8(field: string): Buffer {
    return this.bytes(this.u8(field), field);
  }

  /** Opaque vector with a two-byte length prefix */
  vector16(field: string): Buffer {
    return this.bytes(this.u16(field), field);
  }

  private require(length: number, field: string): void {
    if (this.remaining < length) {
      throw ClientHelloError.malformed(`truncated ${field}`);
    }
  }
}

/**
 * Accumulates connection bytes until a complete ClientHello is available.
 *
 * The handshake message may be fragmented over several records and several
 * TCP segments; `push` returns undefined until the whole message is buffered.
 */
export class ClientHelloReader {
  private readonly chunks: Buffer[] = [];
  private length = 0;

  constructor(private readonly maxBytes: number = CLIENT_HELLO_MAX_BYTES) {}

  /**
   * Feed the next chunk read from the connection.
   *
   * @returns The parsed ClientHello, or undefined while more bytes are needed
   * @throws {ClientHelloError} When the bytes are not a TLS ClientHello or exceed the size limit
   */
  push(chunk: Buffer): ClientHelloInfo | undefined {
    this.chunks.push(chunk);
    this.length += chunk.length;

    const data = this.buffered();
    if (data.length > 0 && data[0] !== CONTENT_TYPE_HANDSHAKE) {
      throw ClientHelloError.notTls(data[0]);
    }

    const message = reassembleHandshakeMessage(data);
    if (message) {
      return parseClientHello(message);
    }

    if (this.length > this.maxBytes) {
      throw ClientHelloError.tooLarge(this.maxBytes);
    }
    return undefined;
  }

  /** Every byte received so far, to be replayed into the TLS stack */
  buffered(): Buffer {
    if (this.chunks.length > 1) {
      const joined = Buffer.concat(this.chunks, this.length);
      this.chunks.length = 0;
      this.chunks.push(joined);
    }
    return this.chunks[0] ?? Buffer.alloc(0);
  }
}

/**
 * Concatenate handshake record fragments and return the body of the first
 * handshake message once it is complete.
 */
export function reassembleHandshakeMessage(data: Buffer): Buffer | undefined {
  const fragments: Buffer[] = [];
  let fragmentLength = 0;
  let offset = 0;

  while (data.length - offset >= RECORD_HEADER_LENGTH) {
    const contentType = data[offset];
    const majorVersion = data[offset + 1];
    const recordLength = data.readUInt16BE(offset + 3);

    if (contentType !== CONTENT_TYPE_HANDSHAKE) {
      throw ClientHelloError.malformed(`unexpected record type ${contentType} before ClientHello`);
    }
    if (majorVersion !== 0x03) {
      throw ClientHelloError.malformed(`unsupported record version ${majorVersion}.${data[offset + 2]}`);
    }
    if (recordLength === 0 || recordLength > MAX_RECORD_LENGTH) {
      throw ClientHelloError.malformed(`invalid record length ${recordLength}`);
    }
    if (data.length - offset - RECORD_HEADER_LENGTH < recordLength) {
      break;
    }

    const start = offset + RECORD_HEADER_LENGTH;
    fragments.push(data.subarray(start, start + recordLength));
    fragmentLength += recordLength;
    offset = start + recordLength;

    const message = Buffer.concat(fragments, fragmentLength);
    if (message[0] !== HANDSHAKE_TYPE_CLIENT_HELLO) {
      throw ClientHelloError.malformed(`first handshake message has type ${message[0]}`);
    }
    if (message.length >= HANDSHAKE_HEADER_LENGTH) {
      const bodyLength = message.readUIntBE(1, 3);
      if (message.length >= HANDSHAKE_HEADER_LENGTH + bodyLength) {
        return message.subarray(HANDSHAKE_HEADER_LENGTH, HANDSHAKE_HEADER_LENGTH + bodyLength);
      }
    }
  }

  return undefined;
}

/**
 * Parse a ClientHello handshake body (without the 4-byte handshake header).
 *
 * @throws {ClientHelloError} On truncated fields, duplicate extensions, or invalid SNI/ALPN contents
 */
export function parseClientHello(body: Buffer): ClientHelloInfo {
  const reader = new ByteReader(body);

  const legacyVersion = reader.u16('legacy_version');
  reader.bytes(32, 'random');
  const sessionId = reader.vector8('legacy_session_id');
  if (sessionId.length > 32) {
    throw ClientHelloError.malformed('session id longer than 32 bytes');
  }
  reader.vector16('cipher_suites');
  reader.vector8('legacy_compression_methods');

  const hello: ClientHelloInfo = { legacyVersion, serverName: '', protocols: [] };
  if (reader.remaining === 0) {
    return hello;
  }

  const extensions = new ByteReader(reader.vector16('extensions'));
  if (reader.remaining !== 0) {
    throw ClientHelloError.malformed('trailing bytes after extensions');
  }

  const seen = new Set<number>();
  while (extensions.remaining > 0) {
    const type = extensions.u16('extension type');
    const data = extensions.vector16('extension data');
    if (seen.has(type)) {
      throw ClientHelloError.malformed(`duplicate extension ${type}`);
    }
    seen.add(type);

    if (type === EXTENSION_SERVER_NAME) {
      hello.serverName = parseServerName(data);
    } else if (type === EXTENSION_ALPN) {
      hello.protocols = parseAlpnProtocols(data);
    }
  }

  return hello;
}

function parseServerName(data: Buffer): string {
  const extension = new ByteReader(data);
  const list = new ByteReader(extension.vector16('server_name_list'));
  if (extension.remaining !== 0) {
    throw ClientHelloError.malformed('trailing bytes after server_name_list');
  }

  let serverName = '';
  while (list.remaining > 0) {
    const nameType = list.u8('name_type');
    const name = list.vector16('host_name');
    if (nameType !== NAME_TYPE_HOST_NAME) {
      continue;
    }
    if (serverName) {
      throw ClientHelloError.malformed('multiple host_name entries');
    }
    serverName = name.toString('latin1');
    if (!serverName || serverName.endsWith('.')) {
      throw ClientHelloError.malformed(`invalid host_name "${serverName}"`);
    }
  }
  return serverName;
}

function parseAlpnProtocols(data: Buffer): string[] {
  const extension = new ByteReader(data);
  const list = new ByteReader(extension.vector16('protocol_name_list'));
  if (extension.remaining !== 0) {
    throw ClientHelloError.malformed('trailing bytes after protocol_name_list');
  }

  const protocols: string[] = [];
  while (list.remaining > 0) {
    const protocol = list.vector8('protocol_name');
    if (protocol.length === 0) {
      throw ClientHelloError.malformed('empty ALPN protocol name');
    }
    protocols.push(protocol.toString('latin1'));
  }
  if (protocols.length === 0) {
    throw ClientHelloError.malformed('empty ALPN protocol list');
  }
  return protocols;
}
