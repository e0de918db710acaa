import { SHUTDOWN_GRACE_MS } from '../../lib/constants/defaults.js';
import { ChallengeTestServer } from '../../lib/server/challenge-test-server.js';
import { formatAddress } from '../../lib/utils/address.js';
import { heading, kv, render } from '../logger.js';

/** Options for the serve command. */
export interface ServeOptions {
  tlsalpn01: string;
  /** Listen address, or false when started with --no-management */
  management: string | false;
  timeout: number;
  /** Drain window before open connections are destroyed */
  shutdownGrace?: number;
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

/**
 * Run the challenge test server until SIGINT or SIGTERM. A second signal, or
 * the grace period running out, destroys connections that are still open.
 */
export async function handleServeCommand(options: ServeOptions) {
  const server = await ChallengeTestServer.create({
    tlsAlpnAddress: options.tlsalpn01,
    managementAddress: options.management,
    timeoutMs: options.timeout,
  });

  server.tlsAlpn.on('handshake', (event) => {
    const kind = event.challenge ? 'challenge' : 'fallback';
    render.muted(`${event.remoteAddress} ${kind} handshake for ${event.serverName || '<no sni>'}`);
  });
  server.tlsAlpn.on('handshakeError', (event) => {
    render.warn(`${event.remoteAddress} ${event.serverName || '<no sni>'}: ${event.error.message}`);
  });

  const addresses = await server.start();
  heading('TLS-ALPN-01 challenge test server');
  kv('TLS-ALPN-01', formatAddress(addresses.tlsAlpn.address, addresses.tlsAlpn.port));
  kv(
    'Management',
    addresses.management ? formatAddress(addresses.management.address, addresses.management.port) : 'disabled',
  );
  render.blank();

  const signal = await waitForSignal();
  render.info(`${signal} received, shutting down`);

  const controller = new AbortController();
  const abort = () => controller.abort();
  const timer = setTimeout(abort, options.shutdownGrace ?? SHUTDOWN_GRACE_MS);
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);
  try {
    await server.shutdown(controller.signal);
  } finally {
    clearTimeout(timer);
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
  }
  render.success('Server stopped');
}
