/**
 * Default configuration constants for the TLS-ALPN-01 test server
 *
 * Centralized defaults for listeners, timeouts and certificate lifetimes.
 * These values are used as fallbacks when no explicit configuration is provided.
 */

// Listener defaults
export const DEFAULT_TLS_ALPN_ADDRESS = ':5001';
export const DEFAULT_MANAGEMENT_ADDRESS = ':8055';
export const DEFAULT_MANAGEMENT_URL = 'http://localhost:8055';

// Connection defaults
export const CONNECTION_TIMEOUT_MS = 5_000; // read/write inactivity per connection
export const CLIENT_HELLO_MAX_BYTES = 16 * 1024;
export const MANAGEMENT_BODY_MAX_BYTES = 64 * 1024;

// Certificate defaults
export const FALLBACK_COMMON_NAME = 'challenge test server';
export const CERTIFICATE_BACKDATE_MS = 60 * 60 * 1_000; // 1 hour of clock skew
export const CHALLENGE_CERTIFICATE_LIFETIME_MS = 24 * 60 * 60 * 1_000; // 1 day

// Validator defaults
export const VALIDATION_TIMEOUT_MS = 4_000;
export const VALIDATION_PORT = 443;

// CLI defaults
export const SHUTDOWN_GRACE_MS = 10_000; // drain window after SIGINT/SIGTERM
