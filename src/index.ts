/**
 * tls-alpn-testsrv - TLS-ALPN-01 (RFC 8737) challenge test server
 *
 * Main entry point
 */

export * from './lib/index.js';

// Warning sink
export { setLogger, logWarn, type LogFunction } from './logger.js';
