import { describe, it, expect } from '@jest/globals';

import {
  ChallengeServerError,
  ClientHelloError,
  HandshakeError,
  IdentityError,
  ManagementApiError,
  ServerStateError,
  SERVER_ERROR,
  TLS_ALERT,
} from '../../src/index.js';

describe('challenge server errors', () => {
  it('share a base class with code, type and name', () => {
    const error = HandshakeError.unknownServerName('example.test');

    expect(error).toBeInstanceOf(ChallengeServerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('HandshakeError');
    expect(error.type).toBe('handshake');
    expect(error.code).toBe('UNKNOWN_SERVER_NAME');
    expect(error.context).toEqual({ serverName: 'example.test' });
  });

  it('map handshake failures to TLS alerts', () => {
    const cause = new Error('boom');
    expect(HandshakeError.unknownServerName('a.test').alert).toBe(112);
    expect(HandshakeError.extensionEncodingFailed('a.test', cause).alert).toBe(TLS_ALERT.internalError);
    expect(HandshakeError.signingFailed('a.test', cause).message).toBe(
      'failed creating challenge certificate for a.test: boom',
    );
  });

  it('describe identity failures with their cause', () => {
    const error = IdentityError.generationFailed('fallback identity', 'no entropy');
    expect(error.message).toBe('Unable to generate fallback identity: no entropy');
    expect(error.code).toBe(SERVER_ERROR.identityGenerationFailed);
    expect(IdentityError.keyExportFailed(new Error('locked')).code).toBe('KEY_EXPORT_FAILED');
  });

  it('format ClientHello failures', () => {
    expect(ClientHelloError.notTls(0x47).message).toBe(
      'connection did not start with a TLS handshake record (first byte 0x47)',
    );
    expect(ClientHelloError.notTls(0x05).message).toContain('(first byte 0x05)');
    expect(ClientHelloError.tooLarge(16384).type).toBe('client-hello');
  });

  it('format management failures', () => {
    expect(ManagementApiError.requestFailed('/add-tlsalpn01', 400, '{"error":"x"}').message).toBe(
      'management request /add-tlsalpn01 failed with HTTP 400: {"error":"x"}',
    );
    expect(ManagementApiError.requestFailed('/del-tlsalpn01', 502, '').message).toBe(
      'management request /del-tlsalpn01 failed with HTTP 502',
    );
    expect(ManagementApiError.invalidRequest('"host" must be a non-empty string').code).toBe('INVALID_REQUEST');
  });

  it('format lifecycle failures', () => {
    expect(ServerStateError.alreadyListening().code).toBe('ALREADY_LISTENING');
    expect(ServerStateError.invalidAddress('nope').message).toBe(
      'invalid listen address "nope", expected [host]:port',
    );
  });
});
