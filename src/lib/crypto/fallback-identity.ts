/**
 * Fallback identity
 *
 * The long-lived self-signed certificate presented to every client that does
 * not negotiate acme-tls/1. It is generated once per server and never changes.
 */

import {
  BasicConstraintsExtension,
  ExtendedKeyUsage,
  ExtendedKeyUsageExtension,
  KeyUsageFlags,
  KeyUsagesExtension,
  SubjectKeyIdentifierExtension,
  X509CertificateGenerator,
} from '@peculiar/x509';

import { CERTIFICATE_BACKDATE_MS, FALLBACK_COMMON_NAME } from '../constants/defaults.js';
import { IdentityError } from '../errors/errors.js';
import type { CertificateBundle } from '../types/certificate.js';
import {
  exportPrivateKeyPem,
  generateSigningKeyPair,
  randomSerialNumber,
  SIGNING_ALGORITHM,
} from './keys.js';

export interface FallbackIdentityOptions {
  /** Subject common name. Defaults to "challenge test server". */
  commonName?: string;
  /** Reference time for the validity window. Defaults to the current time. */
  now?: Date;
  /** How far notBefore lies before `now`, absorbing client clock skew. Defaults to 1 hour. */
  backdateMs?: number;
  /** Reuse an existing key pair instead of generating one */
  keys?: CryptoKeyPair;
}

/**
 * Create the self-signed CA-like certificate valid from `now - backdateMs` to
 * one calendar year after `now`.
 *
 * @throws {IdentityError} When key generation, signing or export fails
 */
export async function createFallbackIdentity(
  options: FallbackIdentityOptions = {},
): Promise<CertificateBundle> {
  const {
    commonName = FALLBACK_COMMON_NAME,
    now = new Date(),
    backdateMs = CERTIFICATE_BACKDATE_MS,
  } = options;

  try {
    const keys = options.keys ?? (await generateSigningKeyPair());

    const notAfter = new Date(now.getTime());
    notAfter.setFullYear(notAfter.getFullYear() + 1);

    const certificate = await X509CertificateGenerator.createSelfSigned({
      serialNumber: randomSerialNumber(),
      name: `CN=${commonName}`,
      notBefore: new Date(now.getTime() - backdateMs),
      notAfter,
      keys,
      signingAlgorithm: SIGNING_ALGORITHM,
      extensions: [
        new BasicConstraintsExtension(true, undefined, true),
        new KeyUsagesExtension(KeyUsageFlags.digitalSignature | KeyUsageFlags.keyCertSign, true),
        new ExtendedKeyUsageExtension([ExtendedKeyUsage.serverAuth, ExtendedKeyUsage.clientAuth]),
        await SubjectKeyIdentifierExtension.create(keys.publicKey),
      ],
    });

    return {
      certificate,
      certPem: certificate.toString('pem'),
      keyPem: await exportPrivateKeyPem(keys.privateKey),
    };
  } catch (error) {
    throw IdentityError.generationFailed('fallback identity', error);
  }
}
