const SHORT_ESCAPES: Record<number, string> = {
  0x00: '\\0',
  0x07: '\\a',
  0x08: '\\b',
  0x09: '\\t',
  0x0a: '\\n',
  0x0d: '\\r',
  0x5c: '\\\\',
};

/**
 * Renders bytes as printable ASCII. Control characters, bytes above 0x7e and
 * the backslash itself are escaped; bytes without a short escape become
 * `\xHH`.
 */
export function backslashify(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) {
    const short = SHORT_ESCAPES[byte];
    if (short) {
      out += short;
    } else if (byte < 0x20 || byte > 0x7e) {
      out += `\\x${byte.toString(16).padStart(2, '0')}`;
    } else {
      out += String.fromCharCode(byte);
    }
  }
  return out;
}
