import { createHash } from 'crypto';
import { percentEncode } from '../utils/percentEncode.js';
import type { RequestParams, SignedRequest } from '../types/index.js';

// Never part of the signed string
const UNSIGNED_PARAMS = new Set(['api_sig', 'format']);

function compareBytes(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

export class RequestSigner {
  /** Parameter entries sorted by key in UTF-8 byte order. */
  static canonicalize(params: RequestParams): Array<[string, string]> {
    return Object.entries(params)
      .filter(([key]) => !UNSIGNED_PARAMS.has(key))
      .sort(([a], [b]) => compareBytes(a, b));
  }

  /**
   * LastFM's api_sig: every `key` immediately followed by its `value` in
   * sorted order, then the shared secret, MD5-hashed and hex-encoded.
   */
  static sign(params: RequestParams, secret: string): string {
    const unhashed =
      RequestSigner.canonicalize(params)
        .map(([key, value]) => `${key}${value}`)
        .join('') + secret;

    return createHash('md5').update(unhashed, 'utf8').digest('hex');
  }

  static buildQuery(params: RequestParams, signature?: string): string {
    const pairs = RequestSigner.canonicalize(params).map(
      ([key, value]) => `${percentEncode(key)}=${percentEncode(value)}`
    );

    pairs.push('format=json');
    if (signature) {
      pairs.push(`api_sig=${signature}`);
    }

    return pairs.join('&');
  }

  static buildUri(root: string, params: RequestParams, signature?: string): string {
    return `${root}/?${RequestSigner.buildQuery(params, signature)}`;
  }

  static signRequest(params: RequestParams, secret: string): SignedRequest {
    const signature = RequestSigner.sign(params, secret);

    return {
      params: RequestSigner.canonicalize(params),
      signature,
      body: RequestSigner.buildQuery(params, signature),
    };
  }
}
