/**
 * TLS-ALPN-01 protocol constants (RFC 8737)
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8737 | RFC 8737 - ACME TLS-ALPN-01}
 */

/** ALPN protocol identifier a validation client offers (RFC 8737 Section 6.2) */
export const ACME_TLS_1_PROTOCOL = 'acme-tls/1';

/** id-pe-acmeIdentifier, the extension carrying the key authorization digest (RFC 8737 Section 6.1) */
export const ACME_IDENTIFIER_OID = '1.3.6.1.5.5.7.1.31';

/** Fixed serial number of minted challenge certificates */
export const CHALLENGE_CERTIFICATE_SERIAL = 1729;

/** Protocols the server advertises; http/1.1 lets ordinary clients negotiate HTTP */
export const SERVER_ALPN_PROTOCOLS: readonly string[] = [ACME_TLS_1_PROTOCOL, 'http/1.1'];
