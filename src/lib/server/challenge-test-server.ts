/**
 * Challenge test server
 *
 * Owns the challenge registry and wires it to the TLS-ALPN-01 listener and the
 * management API. The fallback identity and the challenge signing key are
 * created once per instance and never change afterwards.
 */

import type { RequestListener } from 'http';
import type { AddressInfo } from 'net';

import { DEFAULT_MANAGEMENT_ADDRESS, DEFAULT_TLS_ALPN_ADDRESS } from '../constants/defaults.js';
import { createFallbackIdentity } from '../crypto/fallback-identity.js';
import { generateSigningKeyPair } from '../crypto/keys.js';
import { IdentityError } from '../errors/errors.js';
import { ChallengeRegistry, type ChallengeLookup } from '../registry/challenge-registry.js';
import { ChallengeCertificateIssuer } from '../tls/certificate-issuer.js';
import { TlsAlpnServer } from '../tls/tls-alpn-server.js';
import type { CertificateBundle } from '../types/certificate.js';
import { debugServer } from '../utils/debug.js';
import { ManagementApi } from './management-api.js';

export interface ChallengeTestServerOptions {
  /** TLS-ALPN-01 listen address. Defaults to ":5001". */
  tlsAlpnAddress?: string;
  /** Management API listen address, or false to run without it. Defaults to ":8055". */
  managementAddress?: string | false;
  /** Per-connection inactivity timeout on the TLS listener */
  timeoutMs?: number;
  /** Handler for HTTP requests after a completed handshake */
  handler?: RequestListener;
  /** Reuse a fallback identity instead of generating one */
  fallbackIdentity?: CertificateBundle;
  /** Reuse a challenge signing key pair instead of generating one */
  signingKeys?: CryptoKeyPair;
}

export interface ChallengeTestServerAddresses {
  tlsAlpn: AddressInfo;
  management?: AddressInfo;
}

export class ChallengeTestServer {
  private constructor(
    readonly registry: ChallengeRegistry,
    readonly issuer: ChallengeCertificateIssuer,
    readonly tlsAlpn: TlsAlpnServer,
    readonly management: ManagementApi | undefined,
    private readonly tlsAlpnAddress: string,
    private readonly managementAddress: string | undefined,
  ) {}

  /**
   * Create a server with its fallback identity and challenge signing key.
   * Nothing is bound until `start()`.
   *
   * @throws {IdentityError} When either identity cannot be generated
   */
  static async create(options: ChallengeTestServerOptions = {}): Promise<ChallengeTestServer> {
    const registry = new ChallengeRegistry();
    const fallback = options.fallbackIdentity ?? (await createFallbackIdentity());

    let signingKeys = options.signingKeys;
    if (!signingKeys) {
      try {
        signingKeys = await generateSigningKeyPair();
      } catch (error) {
        throw IdentityError.generationFailed('challenge signing key', error);
      }
    }

    const issuer = await ChallengeCertificateIssuer.create({ registry, fallback, signingKeys });
    const tlsAlpn = new TlsAlpnServer({
      selectCertificate: issuer.selectCertificate,
      ...(options.handler ? { handler: options.handler } : {}),
      ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
    });

    const managementAddress =
      options.managementAddress === false
        ? undefined
        : (options.managementAddress ?? DEFAULT_MANAGEMENT_ADDRESS);
    const management = managementAddress === undefined ? undefined : new ManagementApi({ registry });

    return new ChallengeTestServer(
      registry,
      issuer,
      tlsAlpn,
      management,
      options.tlsAlpnAddress ?? DEFAULT_TLS_ALPN_ADDRESS,
      managementAddress,
    );
  }

  /** Register a TLS-ALPN-01 key authorization for `host`, replacing any earlier one */
  addChallenge(host: string, keyAuthorization: string): void {
    this.registry.add(host, keyAuthorization);
  }

  deleteChallenge(host: string): void {
    this.registry.delete(host);
  }

  getChallenge(host: string): ChallengeLookup {
    return this.registry.get(host);
  }

  /** Bind the TLS-ALPN-01 listener and, when configured, the management API */
  async start(): Promise<ChallengeTestServerAddresses> {
    const tlsAlpn = await this.tlsAlpn.listen(this.tlsAlpnAddress);
    if (!this.management || this.managementAddress === undefined) {
      debugServer('started without management API');
      return { tlsAlpn };
    }

    try {
      const management = await this.management.listen(this.managementAddress);
      debugServer('started');
      return { tlsAlpn, management };
    } catch (error) {
      await this.tlsAlpn.shutdown();
      throw error;
    }
  }

  /**
   * Stop both listeners. TLS connections drain until `signal` aborts.
   */
  async shutdown(signal?: AbortSignal): Promise<void> {
    const pending: Promise<void>[] = [];
    if (this.management?.listening) {
      pending.push(this.management.close());
    }
    if (this.tlsAlpn.listening) {
      pending.push(this.tlsAlpn.shutdown(signal));
    }
    await Promise.all(pending);
    debugServer('stopped');
  }
}
