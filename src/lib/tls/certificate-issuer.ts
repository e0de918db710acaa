/**
 * TLS-ALPN-01 certificate selection
 *
 * Runs once per incoming handshake with the client's SNI name and ALPN offer:
 * - anything other than exactly ["acme-tls/1"] gets the fallback identity
 * - acme-tls/1 for a registered name gets a freshly minted challenge certificate
 * - acme-tls/1 for an unregistered name fails the handshake
 */

import type { Extension, X509Certificate } from '@peculiar/x509';

import { CHALLENGE_CERTIFICATE_LIFETIME_MS, CERTIFICATE_BACKDATE_MS } from '../constants/defaults.js';
import { ACME_TLS_1_PROTOCOL } from '../constants/protocol.js';
import { createAcmeIdentifierExtension, createChallengeCertificate } from '../crypto/challenge-certificate.js';
import { exportPrivateKeyPem } from '../crypto/keys.js';
import { HandshakeError, IdentityError } from '../errors/errors.js';
import type { ChallengeSource } from '../registry/challenge-registry.js';
import type { CertificateBundle, ClientHelloSummary } from '../types/certificate.js';
import { debugIssuer } from '../utils/debug.js';

/**
 * Certificate selection hook plugged into the TLS server.
 * Rejects with a HandshakeError to abort the handshake.
 */
export type CertificateSelector = (hello: ClientHelloSummary) => Promise<CertificateBundle>;

export interface ChallengeCertificateIssuerOptions {
  /** Registry consulted on every acme-tls/1 handshake */
  registry: ChallengeSource;
  /** Certificate for every other handshake */
  fallback: CertificateBundle;
  /** Key pair challenge certificates are self-signed with; distinct from the fallback key */
  signingKeys: CryptoKeyPair;
  /** Challenge certificate lifetime after the backdated notBefore. Defaults to 1 day. */
  lifetimeMs?: number;
  /** Clock, for tests */
  now?: () => Date;
}

/** True when the client offered exactly one protocol and it is acme-tls/1 */
export function isAcmeTlsAlpnHello(protocols: readonly string[]): boolean {
  return protocols.length === 1 && protocols[0] === ACME_TLS_1_PROTOCOL;
}

export class ChallengeCertificateIssuer {
  private constructor(
    private readonly opts: Required<ChallengeCertificateIssuerOptions>,
    private readonly signingKeyPem: string,
  ) {}

  /**
   * Create an issuer. The signing key is exported to PEM once, up front.
   *
   * @throws {IdentityError} When the signing key cannot be exported
   */
  static async create(options: ChallengeCertificateIssuerOptions): Promise<ChallengeCertificateIssuer> {
    let signingKeyPem: string;
    try {
      signingKeyPem = await exportPrivateKeyPem(options.signingKeys.privateKey);
    } catch (error) {
      throw IdentityError.keyExportFailed(error);
    }

    return new ChallengeCertificateIssuer(
      {
        lifetimeMs: CHALLENGE_CERTIFICATE_LIFETIME_MS,
        now: () => new Date(),
        ...options,
      },
      signingKeyPem,
    );
  }

  get fallback(): CertificateBundle {
    return this.opts.fallback;
  }

  /** Bound selector for TlsAlpnServer */
  readonly selectCertificate: CertificateSelector = async (hello) => {
    if (!isAcmeTlsAlpnHello(hello.protocols)) {
      debugIssuer('fallback certificate for %s (alpn=%o)', hello.serverName || '<no sni>', hello.protocols);
      return this.opts.fallback;
    }

    // Single synchronous read; nothing below touches the registry again
    const { keyAuthorization, found } = this.opts.registry.get(hello.serverName);
    if (!found) {
      debugIssuer('no challenge registered for %s', hello.serverName || '<no sni>');
      throw HandshakeError.unknownServerName(hello.serverName);
    }

    return this.issue(hello.serverName, keyAuthorization);
  };

  /**
   * Mint a challenge certificate for `serverName` proving `keyAuthorization`.
   *
   * @throws {HandshakeError} When encoding the extension or signing fails
   */
  async issue(serverName: string, keyAuthorization: string): Promise<CertificateBundle> {
    let acmeIdentifier: Extension;
    try {
      acmeIdentifier = await createAcmeIdentifierExtension(keyAuthorization);
    } catch (error) {
      throw HandshakeError.extensionEncodingFailed(serverName, error);
    }

    const now = this.opts.now().getTime();
    let certificate: X509Certificate;
    try {
      certificate = await createChallengeCertificate({
        serverName,
        acmeIdentifier,
        keys: this.opts.signingKeys,
        notBefore: new Date(now - CERTIFICATE_BACKDATE_MS),
        notAfter: new Date(now + this.opts.lifetimeMs),
      });
    } catch (error) {
      throw HandshakeError.signingFailed(serverName, error);
    }

    debugIssuer('issued challenge certificate for %s', serverName);
    return {
      certificate,
      certPem: certificate.toString('pem'),
      keyPem: this.signingKeyPem,
    };
  }
}
