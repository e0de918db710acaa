export { parseListenAddress, formatAddress, type ListenAddress } from './address.js';
export { TypedEventEmitter } from './typed-emitter.js';
export { toArrayBuffer } from './bytes.js';
