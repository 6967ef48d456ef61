const UNRESERVED = /^[A-Za-z0-9\-_~.]$/;

/**
 * RFC 3986 percent-encoding as LastFM expects it: unreserved characters pass
 * through, everything else becomes one lowercase `%xx` per UTF-8 byte.
 */
export function percentEncode(value: string): string {
  let encoded = '';

  for (const char of value) {
    if (UNRESERVED.test(char)) {
      encoded += char;
      continue;
    }

    for (const byte of Buffer.from(char, 'utf8')) {
      encoded += `%${byte.toString(16).padStart(2, '0')}`;
    }
  }

  return encoded;
}
