/**
 * Debug logging for the challenge test server
 *
 * Namespaced debuggers backed by the `debug` package. Enable with the DEBUG
 * environment variable:
 *
 * DEBUG=tls-alpn-testsrv:* - All debug output
 * DEBUG=tls-alpn-testsrv:tls - Connection and handshake handling
 * DEBUG=tls-alpn-testsrv:issuer - Certificate selection
 * DEBUG=tls-alpn-testsrv:registry - Challenge registrations
 * DEBUG=tls-alpn-testsrv:management - Management API
 * DEBUG=tls-alpn-testsrv:server - Server lifecycle
 * DEBUG=tls-alpn-testsrv:validator - Validation results
 */

import debug from 'debug';

export const DEBUG_NAMESPACE = 'tls-alpn-testsrv';

const createDebugger = (namespace: string): debug.Debugger => debug(`${DEBUG_NAMESPACE}:${namespace}`);

export const debugTls = createDebugger('tls');
export const debugIssuer = createDebugger('issuer');
export const debugRegistry = createDebugger('registry');
export const debugManagement = createDebugger('management');
export const debugServer = createDebugger('server');
export const debugValidator = createDebugger('validator');
