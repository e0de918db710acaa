/**
 * TLS-ALPN-01 test server library - core exports
 */

// Server
export {
  ChallengeTestServer,
  type ChallengeTestServerOptions,
  type ChallengeTestServerAddresses,
} from './server/challenge-test-server.js';
export { ManagementApi, MANAGEMENT_ROUTES, type ManagementApiOptions, type TlsAlpn01Lookup } from './server/management-api.js';
export { ManagementClient, type ManagementClientOptions } from './client/management-client.js';

// Registry
export {
  ChallengeRegistry,
  type ChallengeLookup,
  type ChallengeSource,
} from './registry/challenge-registry.js';

// TLS
export {
  TlsAlpnServer,
  notFoundHandler,
  type TlsAlpnServerOptions,
  type TlsAlpnServerEvents,
  type HandshakeEvent,
  type HandshakeErrorEvent,
} from './tls/tls-alpn-server.js';
export {
  ChallengeCertificateIssuer,
  isAcmeTlsAlpnHello,
  type CertificateSelector,
  type ChallengeCertificateIssuerOptions,
} from './tls/certificate-issuer.js';
export {
  ClientHelloReader,
  parseClientHello,
  reassembleHandshakeMessage,
  type ClientHelloInfo,
} from './tls/client-hello.js';
export { encodeFatalAlert, PLAINTEXT_REJECTION } from './tls/alerts.js';

// Error handling
export {
  ChallengeServerError,
  IdentityError,
  HandshakeError,
  ClientHelloError,
  ManagementApiError,
  ServerStateError,
  type ChallengeServerErrorType,
} from './errors/errors.js';
export {
  SERVER_ERROR,
  TLS_ALERT,
  type ServerErrorCode,
  type TlsAlertDescription,
} from './errors/codes.js';

// Types
export type { CertificateBundle, ClientHelloSummary } from './types/certificate.js';

// Constants
export {
  ACME_TLS_1_PROTOCOL,
  ACME_IDENTIFIER_OID,
  CHALLENGE_CERTIFICATE_SERIAL,
  SERVER_ALPN_PROTOCOLS,
} from './constants/protocol.js';
export * from './constants/defaults.js';

// Cryptographic operations
export {
  generateSigningKeyPair,
  exportPrivateKeyPem,
  randomSerialNumber,
  serialNumberFromInteger,
  createFallbackIdentity,
  digestKeyAuthorization,
  encodeAcmeIdentifierValue,
  createAcmeIdentifierExtension,
  createChallengeCertificate,
  type FallbackIdentityOptions,
  type ChallengeCertificateParams,
} from './crypto/index.js';

// Challenge validation
export {
  validateTlsAlpn01Challenge,
  fetchAcmeTlsAlpnCertificate,
  checkAcmeTlsAlpnCertificate,
  type AcmeTlsAlpnValidationResult,
  type AcmeTlsAlpnValidationOptions,
  type AcmeTlsAlpnHandshake,
} from './challenges/index.js';

// Utils
export { parseListenAddress, formatAddress, toArrayBuffer, type ListenAddress } from './utils/index.js';
