import { webcrypto } from 'crypto';

// Certificate code binds its WebCrypto provider at import time, so expose
// Node's implementation before any test module loads
if (!globalThis.crypto) {
  Object.defineProperty(globalThis, 'crypto', {
    value: webcrypto,
    writable: false,
    configurable: true,
  });
}

process.env.NODE_ENV = 'test';
