import type { X509Certificate } from '@peculiar/x509';

/**
 * A certificate together with the private key a TLS server presents it with
 */
export interface CertificateBundle {
  /** Parsed certificate, for inspection */
  certificate: X509Certificate;
  /** PEM-encoded certificate, as passed to tls.createSecureContext */
  certPem: string;
  /** PEM-encoded PKCS#8 private key matching the certificate */
  keyPem: string;
}

/**
 * What the server learned from a ClientHello before the handshake starts
 */
export interface ClientHelloSummary {
  /** SNI host name, empty when the client sent none */
  serverName: string;
  /** ALPN protocols in client preference order, empty when the extension is absent */
  protocols: string[];
}
