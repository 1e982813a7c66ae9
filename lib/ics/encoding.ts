// "Ã" and "Â" lead almost every two-byte UTF-8 sequence for Latin-1 letters
// once those bytes have been read as Latin-1.
const MOJIBAKE_SIGNATURE = /[ÃÂ]/;

const strictUtf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

function toLatin1Bytes(value: string): Uint8Array | null {
  const bytes = new Uint8Array(value.length);
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code > 0xff) return null;
    bytes[i] = code;
  }
  return bytes;
}

/**
 * Undoes UTF-8 text that was decoded as Latin-1, e.g. "GrÃ¶t" → "Gröt".
 * Values without the telltale characters, or that do not survive the
 * round-trip, come back unchanged.
 */
export function repairMojibake(value: string): string {
  if (!MOJIBAKE_SIGNATURE.test(value)) return value;

  const bytes = toLatin1Bytes(value);
  if (!bytes) return value;

  try {
    return strictUtf8.decode(bytes);
  } catch {
    return value;
  }
}
