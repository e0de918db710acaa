/**
 * TLS-ALPN-01 challenge registry
 *
 * Maps hostnames to the key authorization a challenge certificate must prove.
 * Every operation is a single synchronous Map access, so on Node's event loop
 * reads never interleave with a write and never observe a partial value.
 * The certificate issuer reads once, before any asynchronous signing step.
 */

import { debugRegistry } from '../utils/debug.js';

/**
 * Result of a registry lookup. `found: false` is the normal answer for a name
 * without an active challenge, not an error.
 */
export interface ChallengeLookup {
  keyAuthorization: string;
  found: boolean;
}

/** Read side of the registry, as consumed by the certificate issuer */
export interface ChallengeSource {
  get(hostname: string): ChallengeLookup;
}

export class ChallengeRegistry implements ChallengeSource {
  private readonly entries = new Map<string, string>();

  /** Register `keyAuthorization` for `hostname`, replacing any earlier registration */
  add(hostname: string, keyAuthorization: string): void {
    const replaced = this.entries.has(hostname);
    this.entries.set(hostname, keyAuthorization);
    debugRegistry('%s challenge for %s', replaced ? 'replaced' : 'added', hostname);
  }

  /** Remove the registration for `hostname`; absent names are ignored */
  delete(hostname: string): void {
    if (this.entries.delete(hostname)) {
      debugRegistry('deleted challenge for %s', hostname);
    }
  }

  get(hostname: string): ChallengeLookup {
    const keyAuthorization = this.entries.get(hostname);
    return keyAuthorization === undefined
      ? { keyAuthorization: '', found: false }
      : { keyAuthorization, found: true };
  }

  clear(): void {
    this.entries.clear();
    debugRegistry('cleared all challenges');
  }

  get size(): number {
    return this.entries.size;
  }
}
