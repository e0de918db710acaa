/**
 * Key material for challenge and fallback certificates
 *
 * Features:
 * - ECDSA P-256 signing keys
 * - PKCS#8 PEM export for tls.createSecureContext
 * - Random non-negative certificate serial numbers
 * - WebCrypto API based
 */

import { Crypto as PeculiarCrypto } from '@peculiar/webcrypto';
import { cryptoProvider, PemConverter } from '@peculiar/x509';

// Use Node's global WebCrypto if available, otherwise fall back to @peculiar/webcrypto
export const provider: Crypto =
  globalThis.crypto && 'subtle' in globalThis.crypto
    ? globalThis.crypto
    : (new PeculiarCrypto() as Crypto);

// Bind WebCrypto provider for @peculiar/x509
cryptoProvider.set(provider);

/** Signature algorithm for every certificate the server mints */
export const SIGNING_ALGORITHM = { name: 'ECDSA', hash: 'SHA-256' } as const;

const KEY_ALGORITHM: EcKeyGenParams = { name: 'ECDSA', namedCurve: 'P-256' };

/**
 * Generate an extractable ECDSA P-256 key pair.
 * Extractable so the private key can be handed to the TLS stack as PEM.
 */
export async function generateSigningKeyPair(): Promise<CryptoKeyPair> {
  return provider.subtle.generateKey(KEY_ALGORITHM, true, ['sign', 'verify']);
}

/** Export a private key as a PKCS#8 PEM block */
export async function exportPrivateKeyPem(key: CryptoKey): Promise<string> {
  const pkcs8 = await provider.subtle.exportKey('pkcs8', key);
  return PemConverter.encode(pkcs8, 'PRIVATE KEY');
}

/**
 * Hex serial number drawn uniformly from [0, 2^63), minimally encoded so the
 * resulting ASN.1 INTEGER stays positive.
 */
export function randomSerialNumber(): string {
  const bytes = provider.getRandomValues(new Uint8Array(8));
  bytes[0] &= 0x7f;
  return toSerialHex(bytes);
}

/** Encode a non-negative integer as the hex form of a minimal positive DER INTEGER */
export function serialNumberFromInteger(value: number): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`serial number must be a non-negative safe integer, got ${value}`);
  }

  const bytes: number[] = [];
  for (let n = value; n > 0; n = Math.floor(n / 256)) {
    bytes.unshift(n % 256);
  }
  return toSerialHex(Uint8Array.from(bytes));
}

function toSerialHex(bytes: Uint8Array): string {
  let start = 0;
  while (start < bytes.length - 1 && bytes[start] === 0) {
    start++;
  }

  const trimmed = Buffer.from(bytes.subarray(start));
  if (trimmed.length === 0) {
    return '00';
  }
  // A leading byte with the high bit set would read as a negative INTEGER
  return (trimmed[0] & 0x80 ? '00' : '') + trimmed.toString('hex');
}
