/**
 * RFC 8737 TLS-ALPN-01 challenge validation
 */

export {
  validateTlsAlpn01Challenge,
  fetchAcmeTlsAlpnCertificate,
  checkAcmeTlsAlpnCertificate,
  type AcmeTlsAlpnValidationResult,
  type AcmeTlsAlpnValidationOptions,
  type AcmeTlsAlpnHandshake,
} from './tls-alpn-validator.js';
