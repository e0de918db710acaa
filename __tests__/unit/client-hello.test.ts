import { describe, it, expect } from '@jest/globals';

import {
  ClientHelloReader,
  parseClientHello,
  reassembleHandshakeMessage,
} from '../../src/lib/tls/client-hello.js';
import { ClientHelloError } from '../../src/lib/errors/errors.js';
import { SERVER_ERROR } from '../../src/lib/errors/codes.js';
import {
  alpnExtensionData,
  buildClientHello,
  buildClientHelloBody,
  buildHandshakeMessage,
  buildRecords,
} from '../helpers/client-hello-builder.js';

function captureError(fn: () => unknown): ClientHelloError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ClientHelloError) return error;
    throw error;
  }
  throw new Error('expected ClientHelloError');
}

describe('ClientHelloReader', () => {
  it('parses SNI and ALPN from a single record', () => {
    const reader = new ClientHelloReader();
    const hello = reader.push(buildClientHello({ serverName: 'example.test', protocols: ['acme-tls/1'] }));

    expect(hello).toEqual({ legacyVersion: 0x0303, serverName: 'example.test', protocols: ['acme-tls/1'] });
  });

  it('waits for a ClientHello split across records and TCP segments', () => {
    const wire = buildClientHello({ serverName: 'example.test', protocols: ['h2', 'http/1.1'] }, 10);
    const reader = new ClientHelloReader();

    const results: Array<ReturnType<ClientHelloReader['push']>> = [];
    for (let offset = 0; offset < wire.length; offset += 7) {
      results.push(reader.push(wire.subarray(offset, offset + 7)));
    }

    expect(results.slice(0, -1).every((r) => r === undefined)).toBe(true);
    expect(results[results.length - 1]).toEqual({
      legacyVersion: 0x0303,
      serverName: 'example.test',
      protocols: ['h2', 'http/1.1'],
    });
    expect(reader.buffered().equals(wire)).toBe(true);
  });

  it('returns undefined until the record header is complete', () => {
    const reader = new ClientHelloReader();
    expect(reader.push(Buffer.from([0x16, 0x03]))).toBeUndefined();
  });

  it('rejects plaintext HTTP as not TLS', () => {
    const reader = new ClientHelloReader();
    const error = captureError(() => reader.push(Buffer.from('GET / HTTP/1.1\r\n')));

    expect(error.code).toBe(SERVER_ERROR.notTls);
    expect(error.message).toBe('connection did not start with a TLS handshake record (first byte 0x47)');
  });

  it('rejects a ClientHello larger than the limit', () => {
    const reader = new ClientHelloReader(64);
    const header = Buffer.from([0x16, 0x03, 0x01, 0x03, 0xe8]);
    const error = captureError(() => reader.push(Buffer.concat([header, Buffer.alloc(100)])));

    expect(error.code).toBe(SERVER_ERROR.clientHelloTooLarge);
    expect(error.message).toBe('ClientHello exceeds 64 bytes');
  });
});

describe('reassembleHandshakeMessage', () => {
  it('returns the handshake body once complete', () => {
    const body = buildClientHelloBody({ serverName: 'a.test' });
    const message = reassembleHandshakeMessage(buildRecords(buildHandshakeMessage(body)));

    expect(message?.equals(body)).toBe(true);
  });

  it('rejects a handshake message that is not a ClientHello', () => {
    const error = captureError(() => reassembleHandshakeMessage(Buffer.from([0x16, 0x03, 0x01, 0x00, 0x01, 0x02])));
    expect(error.message).toBe('malformed ClientHello: first handshake message has type 2');
  });

  it('rejects an SSLv2-style record version', () => {
    const error = captureError(() => reassembleHandshakeMessage(Buffer.from([0x16, 0x02, 0x00, 0x00, 0x01, 0x01])));
    expect(error.code).toBe(SERVER_ERROR.malformedClientHello);
  });

  it('rejects empty records', () => {
    const error = captureError(() => reassembleHandshakeMessage(Buffer.from([0x16, 0x03, 0x01, 0x00, 0x00])));
    expect(error.message).toBe('malformed ClientHello: invalid record length 0');
  });
});

describe('parseClientHello', () => {
  it('reports no server name and no protocols when there are no extensions', () => {
    expect(parseClientHello(buildClientHelloBody({}, false))).toEqual({
      legacyVersion: 0x0303,
      serverName: '',
      protocols: [],
    });
  });

  it('ignores unrelated extensions', () => {
    const hello = parseClientHello(
      buildClientHelloBody({
        serverName: 'example.test',
        extraExtensions: [[0x002b, Buffer.from([0x02, 0x03, 0x04])]],
      }),
    );
    expect(hello.serverName).toBe('example.test');
    expect(hello.protocols).toEqual([]);
  });

  it('rejects duplicate extensions', () => {
    const body = buildClientHelloBody({
      protocols: ['http/1.1'],
      extraExtensions: [[0x0010, alpnExtensionData(['h2'])]],
    });
    expect(captureError(() => parseClientHello(body)).message).toBe('malformed ClientHello: duplicate extension 16');
  });

  it('rejects empty ALPN protocol names', () => {
    const body = buildClientHelloBody({ protocols: [''] });
    expect(captureError(() => parseClientHello(body)).message).toBe('malformed ClientHello: empty ALPN protocol name');
  });

  it('rejects an empty ALPN protocol list', () => {
    const body = buildClientHelloBody({ protocols: [] });
    expect(captureError(() => parseClientHello(body)).message).toBe('malformed ClientHello: empty ALPN protocol list');
  });

  it('rejects a host_name with a trailing dot', () => {
    const body = buildClientHelloBody({ serverName: 'example.test.' });
    expect(captureError(() => parseClientHello(body)).message).toBe(
      'malformed ClientHello: invalid host_name "example.test."',
    );
  });

  it('rejects a session id longer than 32 bytes', () => {
    const body = buildClientHelloBody({ sessionId: Buffer.alloc(33) });
    expect(captureError(() => parseClientHello(body)).message).toBe(
      'malformed ClientHello: session id longer than 32 bytes',
    );
  });

  it('rejects a truncated body', () => {
    const body = buildClientHelloBody({ serverName: 'example.test' });
    expect(captureError(() => parseClientHello(body.subarray(0, 20))).message).toBe('malformed ClientHello: truncated random');
  });
});
