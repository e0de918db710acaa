/**
 * Error codes raised by the challenge test server
 *
 * Codes are grouped by the layer that raises them. Every error class in
 * `errors.ts` carries one of these values in its `code` field.
 */
export const SERVER_ERROR = {
  // Startup-fatal: the server cannot exist without its identity
  identityGenerationFailed: 'IDENTITY_GENERATION_FAILED',
  keyExportFailed: 'KEY_EXPORT_FAILED',

  // Per-handshake: abort a single connection
  unknownServerName: 'UNKNOWN_SERVER_NAME',
  extensionEncodingFailed: 'EXTENSION_ENCODING_FAILED',
  certificateSigningFailed: 'CERTIFICATE_SIGNING_FAILED',

  // ClientHello inspection
  notTls: 'NOT_TLS',
  malformedClientHello: 'MALFORMED_CLIENT_HELLO',
  clientHelloTooLarge: 'CLIENT_HELLO_TOO_LARGE',

  // Management API and client
  invalidRequest: 'INVALID_REQUEST',
  requestFailed: 'REQUEST_FAILED',

  // Lifecycle and configuration
  alreadyListening: 'ALREADY_LISTENING',
  notListening: 'NOT_LISTENING',
  invalidAddress: 'INVALID_ADDRESS',
} as const;

export type ServerErrorCode = (typeof SERVER_ERROR)[keyof typeof SERVER_ERROR];

/**
 * TLS alert descriptions sent when a handshake is rejected (RFC 8446 Section 6)
 */
export const TLS_ALERT = {
  internalError: 80,
  unrecognizedName: 112,
} as const;

export type TlsAlertDescription = (typeof TLS_ALERT)[keyof typeof TLS_ALERT];
