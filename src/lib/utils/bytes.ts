/**
 * Copy a view into a standalone ArrayBuffer. WebCrypto and @peculiar/x509
 * take BufferSource, which newer lib.dom typings narrow to ArrayBuffer-backed views.
 */
export function toArrayBuffer(view: Uint8Array): ArrayBuffer {
  const copy = new Uint8Array(view.byteLength);
  copy.set(view);
  return copy.buffer;
}
