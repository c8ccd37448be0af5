export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((total, part) => total + part.length, 0));
  let offset = 0;

  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }

  return out;
}

/**
 * One character per byte. Used for the ASCII parts of binary formats,
 * where no text encoding applies.
 */
export function bytesToLatin1(bytes: Uint8Array): string {
  const CHUNK = 0x2000;
  let text = "";

  // Chunked so the spread stays under the argument-count limit
  for (let i = 0; i < bytes.length; i += CHUNK) {
    text += String.fromCharCode(...bytes.subarray(i, i + CHUNK));
  }

  return text;
}
