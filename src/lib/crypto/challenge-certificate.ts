/**
 * RFC 8737 TLS-ALPN-01 challenge certificates
 *
 * A challenge certificate carries exactly two extensions:
 * - subjectAltName with the single dNSName being validated
 * - id-pe-acmeIdentifier (critical) holding the DER OCTET STRING of
 *   SHA-256(key authorization)
 *
 * @see {@link https://datatracker.ietf.org/doc/html/rfc8737#section-3 | RFC 8737 Section 3}
 */

import { AsnConvert, OctetString } from '@peculiar/asn1-schema';
import {
  Extension,
  SubjectAlternativeNameExtension,
  X509CertificateGenerator,
  type X509Certificate,
} from '@peculiar/x509';

import { ACME_IDENTIFIER_OID, CHALLENGE_CERTIFICATE_SERIAL } from '../constants/protocol.js';
import { toArrayBuffer } from '../utils/bytes.js';
import { provider, serialNumberFromInteger, SIGNING_ALGORITHM } from './keys.js';

/** SHA-256 over the UTF-8 bytes of a key authorization */
export async function digestKeyAuthorization(keyAuthorization: string): Promise<Buffer> {
  const digest = await provider.subtle.digest('SHA-256', new TextEncoder().encode(keyAuthorization));
  return Buffer.from(digest);
}

/**
 * The exact extnValue contents a validator expects for `keyAuthorization`:
 * `04 20` followed by the 32-byte digest.
 */
export async function encodeAcmeIdentifierValue(keyAuthorization: string): Promise<Buffer> {
  const digest = await digestKeyAuthorization(keyAuthorization);
  return Buffer.from(AsnConvert.serialize(new OctetString(digest)));
}

/** Build the critical id-pe-acmeIdentifier extension for `keyAuthorization` */
export async function createAcmeIdentifierExtension(keyAuthorization: string): Promise<Extension> {
  const value = await encodeAcmeIdentifierValue(keyAuthorization);
  return new Extension(ACME_IDENTIFIER_OID, true, toArrayBuffer(value));
}

export interface ChallengeCertificateParams {
  /** The SNI name; becomes the only subjectAltName entry */
  serverName: string;
  /** Pre-built acmeIdentifier extension */
  acmeIdentifier: Extension;
  /** Key pair the certificate is self-signed with */
  keys: CryptoKeyPair;
  notBefore: Date;
  notAfter: Date;
}

/**
 * Self-sign a challenge certificate. The subject is left empty, so the
 * subjectAltName extension is critical (RFC 5280 Section 4.2.1.6).
 */
export async function createChallengeCertificate(
  params: ChallengeCertificateParams,
): Promise<X509Certificate> {
  return X509CertificateGenerator.createSelfSigned({
    serialNumber: serialNumberFromInteger(CHALLENGE_CERTIFICATE_SERIAL),
    name: '',
    notBefore: params.notBefore,
    notAfter: params.notAfter,
    keys: params.keys,
    signingAlgorithm: SIGNING_ALGORITHM,
    extensions: [
      new SubjectAlternativeNameExtension([{ type: 'dns', value: params.serverName }], true),
      params.acmeIdentifier,
    ],
  });
}
