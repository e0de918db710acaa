import type { TlsAlertDescription } from '../errors/codes.js';

const CONTENT_TYPE_ALERT = 0x15;
const ALERT_LEVEL_FATAL = 0x02;

/**
 * A plaintext fatal alert record. Sent in place of a ServerHello when
 * certificate selection rejects the handshake (RFC 8446 Section 6).
 */
export function encodeFatalAlert(description: TlsAlertDescription): Buffer {
  return Buffer.from([CONTENT_TYPE_ALERT, 0x03, 0x03, 0x00, 0x02, ALERT_LEVEL_FATAL, description]);
}

/** Answer for clients that speak plain HTTP to the TLS port */
export const PLAINTEXT_REJECTION =
  'HTTP/1.0 400 Bad Request\r\n\r\nClient sent an HTTP request to an HTTPS server.\n';
