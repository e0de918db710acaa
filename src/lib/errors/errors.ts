/**
 * Challenge test server errors
 *
 * Typed errors for every failure the server distinguishes. Each class carries a
 * stable `code`, a coarse `type` and a `context` record for debugging.
 *
 * - IdentityError: startup-fatal, the server must not start
 * - HandshakeError: aborts a single handshake, reported to the client as a TLS alert
 * - ClientHelloError: the connection never reached a TLS handshake
 */

import { SERVER_ERROR, TLS_ALERT, type ServerErrorCode, type TlsAlertDescription } from './codes.js';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Base class for all challenge test server errors
 */
export abstract class ChallengeServerError extends Error {
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly code: ServerErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Failure to create the fallback identity or the issuer signing key
 */
export class IdentityError extends ChallengeServerError {
  readonly type = 'identity';

  static generationFailed(what: string, cause: unknown): IdentityError {
    return new IdentityError(
      `Unable to generate ${what}: ${describeCause(cause)}`,
      SERVER_ERROR.identityGenerationFailed,
      { what, cause },
    );
  }

  static keyExportFailed(cause: unknown): IdentityError {
    return new IdentityError(
      `Unable to export signing key: ${describeCause(cause)}`,
      SERVER_ERROR.keyExportFailed,
      { cause },
    );
  }
}

/**
 * Certificate selection failed; the handshake is aborted with `alert`
 */
export class HandshakeError extends ChallengeServerError {
  readonly type = 'handshake';

  constructor(
    message: string,
    code: ServerErrorCode,
    public readonly alert: TlsAlertDescription,
    context?: Record<string, unknown>,
  ) {
    super(message, code, context);
  }

  static unknownServerName(serverName: string): HandshakeError {
    return new HandshakeError(
      `unknown ClientHello server name: ${serverName}`,
      SERVER_ERROR.unknownServerName,
      TLS_ALERT.unrecognizedName,
      { serverName },
    );
  }

  static extensionEncodingFailed(serverName: string, cause: unknown): HandshakeError {
    return new HandshakeError(
      `failed encoding key authorization digest for ${serverName}: ${describeCause(cause)}`,
      SERVER_ERROR.extensionEncodingFailed,
      TLS_ALERT.internalError,
      { serverName, cause },
    );
  }

  static signingFailed(serverName: string, cause: unknown): HandshakeError {
    return new HandshakeError(
      `failed creating challenge certificate for ${serverName}: ${describeCause(cause)}`,
      SERVER_ERROR.certificateSigningFailed,
      TLS_ALERT.internalError,
      { serverName, cause },
    );
  }
}

/**
 * The first bytes of a connection are not a usable TLS ClientHello
 */
export class ClientHelloError extends ChallengeServerError {
  readonly type = 'client-hello';

  static notTls(firstByte: number): ClientHelloError {
    return new ClientHelloError(
      `connection did not start with a TLS handshake record (first byte 0x${firstByte.toString(16).padStart(2, '0')})`,
      SERVER_ERROR.notTls,
      { firstByte },
    );
  }

  static malformed(reason: string): ClientHelloError {
    return new ClientHelloError(`malformed ClientHello: ${reason}`, SERVER_ERROR.malformedClientHello, {
      reason,
    });
  }

  static tooLarge(limit: number): ClientHelloError {
    return new ClientHelloError(
      `ClientHello exceeds ${limit} bytes`,
      SERVER_ERROR.clientHelloTooLarge,
      { limit },
    );
  }
}

/**
 * Management API request rejected, or a management call from the client failed
 */
export class ManagementApiError extends ChallengeServerError {
  readonly type = 'management';

  static invalidRequest(reason: string): ManagementApiError {
    return new ManagementApiError(reason, SERVER_ERROR.invalidRequest, { reason });
  }

  static invalidResponse(path: string): ManagementApiError {
    return new ManagementApiError(`unexpected response from ${path}`, SERVER_ERROR.requestFailed, {
      path,
    });
  }

  static requestFailed(path: string, statusCode: number, body: string): ManagementApiError {
    return new ManagementApiError(
      `management request ${path} failed with HTTP ${statusCode}${body ? `: ${body}` : ''}`,
      SERVER_ERROR.requestFailed,
      { path, statusCode, body },
    );
  }
}

/**
 * Server lifecycle misuse or invalid configuration
 */
export class ServerStateError extends ChallengeServerError {
  readonly type = 'state';

  static alreadyListening(): ServerStateError {
    return new ServerStateError('server is already listening', SERVER_ERROR.alreadyListening);
  }

  static notListening(): ServerStateError {
    return new ServerStateError('server is not listening', SERVER_ERROR.notListening);
  }

  static invalidAddress(address: string): ServerStateError {
    return new ServerStateError(
      `invalid listen address "${address}", expected [host]:port`,
      SERVER_ERROR.invalidAddress,
      { address },
    );
  }
}

/**
 * Union type for all challenge test server errors
 */
export type ChallengeServerErrorType =
  | IdentityError
  | HandshakeError
  | ClientHelloError
  | ManagementApiError
  | ServerStateError;
