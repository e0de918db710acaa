/**
 * RFC 8737 TLS-ALPN-01 Challenge Validator
 *
 * The check a CA performs against a TLS-ALPN-01 responder (RFC 8737 Section 3):
 * - connect with SNI set to the domain and ALPN offering only "acme-tls/1"
 * - require the server to negotiate "acme-tls/1"
 * - require exactly one subjectAltName entry, a dNSName equal to the domain
 * - require a critical id-pe-acmeIdentifier extension whose value is the DER
 *   OCTET STRING of SHA-256(key authorization)
 */

import { SubjectAlternativeNameExtension, X509Certificate } from '@peculiar/x509';
import { connect } from 'tls';

import { VALIDATION_PORT, VALIDATION_TIMEOUT_MS } from '../constants/defaults.js';
import { ACME_IDENTIFIER_OID, ACME_TLS_1_PROTOCOL } from '../constants/protocol.js';
import { encodeAcmeIdentifierValue } from '../crypto/challenge-certificate.js';
import { toArrayBuffer } from '../utils/bytes.js';
import { debugValidator } from '../utils/debug.js';

/**
 * Result of TLS-ALPN-01 challenge validation
 */
export interface AcmeTlsAlpnValidationResult {
  /** Validation success status */
  ok: boolean;
  /** Protocol the server negotiated, empty when none */
  alpnProtocol?: string;
  /** Certificate the server presented */
  certificate?: X509Certificate;
  /** Validation failure reasons */
  reasons?: string[];
}

/**
 * Options for TLS-ALPN-01 challenge validation
 */
export interface AcmeTlsAlpnValidationOptions {
  /** Address to connect to (default: the domain itself) */
  host?: string;
  /** TCP port (default: 443) */
  port?: number;
  /** Handshake timeout in milliseconds (default: 4000) */
  timeoutMs?: number;
  /** ALPN protocols to offer (default: ["acme-tls/1"]) */
  alpnProtocols?: string[];
}

/**
 * What a TLS-ALPN-01 handshake returned
 */
export interface AcmeTlsAlpnHandshake {
  alpnProtocol: string;
  certificate: X509Certificate;
}

/**
 * Perform a TLS handshake the way a validation authority does and return the
 * negotiated protocol and the leaf certificate. The certificate chain is not
 * verified; TLS-ALPN-01 certificates are self-signed.
 */
export async function fetchAcmeTlsAlpnCertificate(
  domain: string,
  opts: AcmeTlsAlpnValidationOptions = {},
): Promise<AcmeTlsAlpnHandshake> {
  const {
    host = domain,
    port = VALIDATION_PORT,
    timeoutMs = VALIDATION_TIMEOUT_MS,
    alpnProtocols = [ACME_TLS_1_PROTOCOL],
  } = opts;

  return new Promise<AcmeTlsAlpnHandshake>((resolve, reject) => {
    const socket = connect({
      host,
      port,
      servername: domain,
      ALPNProtocols: alpnProtocols,
      rejectUnauthorized: false,
    });

    socket.setTimeout(timeoutMs, () => {
      socket.destroy(new Error(`TLS handshake with ${host}:${port} timed out after ${timeoutMs}ms`));
    });
    // Listener stays attached: errors after settling must not go unhandled
    socket.on('error', reject);
    socket.once('secureConnect', () => {
      const peer = socket.getPeerCertificate(true);
      const alpnProtocol = socket.alpnProtocol || '';
      socket.end();

      if (!peer.raw || peer.raw.length === 0) {
        reject(new Error(`${host}:${port} presented no certificate`));
        return;
      }
      resolve({ alpnProtocol, certificate: new X509Certificate(toArrayBuffer(peer.raw)) });
    });
  });
}

/**
 * Check a presented certificate against the RFC 8737 requirements.
 *
 * @returns Failure reasons; empty when the certificate proves `keyAuthorization` for `domain`
 */
export async function checkAcmeTlsAlpnCertificate(
  certificate: X509Certificate,
  domain: string,
  keyAuthorization: string,
): Promise<string[]> {
  const reasons: string[] = [];

  const san = certificate.getExtension(SubjectAlternativeNameExtension);
  if (!san) {
    reasons.push('certificate has no subjectAltName extension');
  } else {
    const names = san.names.items;
    if (names.length !== 1) {
      reasons.push(`expected exactly one subjectAltName entry, got ${names.length}`);
    } else if (names[0].type !== 'dns' || names[0].value.toLowerCase() !== domain.toLowerCase()) {
      reasons.push(`subjectAltName ${names[0].type}:${names[0].value} does not match dns:${domain}`);
    }
  }

  const acmeIdentifier = certificate.getExtension(ACME_IDENTIFIER_OID);
  if (!acmeIdentifier) {
    reasons.push(`certificate has no acmeIdentifier extension (${ACME_IDENTIFIER_OID})`);
    return reasons;
  }
  if (!acmeIdentifier.critical) {
    reasons.push('acmeIdentifier extension is not critical');
  }

  const expected = await encodeAcmeIdentifierValue(keyAuthorization);
  const actual = Buffer.from(acmeIdentifier.value);
  if (!actual.equals(expected)) {
    reasons.push(
      `acmeIdentifier mismatch: expected ${expected.toString('hex')}, got ${actual.toString('hex')}`,
    );
  }

  return reasons;
}

/**
 * Validate a TLS-ALPN-01 challenge end to end.
 *
 * @param domain The domain being validated (sent as SNI)
 * @param keyAuthorization The expected key authorization
 * @param opts Validation options
 */
export async function validateTlsAlpn01Challenge(
  domain: string,
  keyAuthorization: string,
  opts: AcmeTlsAlpnValidationOptions = {},
): Promise<AcmeTlsAlpnValidationResult> {
  let handshake: AcmeTlsAlpnHandshake;
  try {
    handshake = await fetchAcmeTlsAlpnCertificate(domain, opts);
  } catch (error) {
    const reason = `TLS handshake for ${domain} failed: ${error instanceof Error ? error.message : String(error)}`;
    debugValidator(reason);
    return { ok: false, reasons: [reason] };
  }

  const { alpnProtocol, certificate } = handshake;
  const reasons: string[] = [];
  if (alpnProtocol !== ACME_TLS_1_PROTOCOL) {
    reasons.push(`server negotiated ALPN "${alpnProtocol}" instead of "${ACME_TLS_1_PROTOCOL}"`);
  }
  reasons.push(...(await checkAcmeTlsAlpnCertificate(certificate, domain, keyAuthorization)));

  debugValidator('%s: %s', domain, reasons.length === 0 ? 'valid' : reasons.join('; '));
  return reasons.length === 0
    ? { ok: true, alpnProtocol, certificate }
    : { ok: false, alpnProtocol, certificate, reasons };
}
