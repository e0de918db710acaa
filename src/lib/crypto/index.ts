/**
 * Certificate and key operations
 * Fallback identity and challenge certificate minting
 */

export {
  provider,
  SIGNING_ALGORITHM,
  generateSigningKeyPair,
  exportPrivateKeyPem,
  randomSerialNumber,
  serialNumberFromInteger,
} from './keys.js';

export { createFallbackIdentity, type FallbackIdentityOptions } from './fallback-identity.js';

export {
  digestKeyAuthorization,
  encodeAcmeIdentifierValue,
  createAcmeIdentifierExtension,
  createChallengeCertificate,
  type ChallengeCertificateParams,
} from './challenge-certificate.js';

