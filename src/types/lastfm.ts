export interface Credentials {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly username: string;
  readonly sessionToken: string;
}

/** What the resolver holds before a session token exists. */
export interface AccountCredentials {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly username: string;
  readonly password: string;
}

export type RequestParams = Record<string, string>;

export interface SignedRequest {
  /** Parameters in canonical (byte-wise key) order, without api_sig */
  params: Array<[string, string]>;
  signature: string;
  /** Form body, also usable as a query string */
  body: string;
}

export interface TrackImage {
  size: string;
  url: string;
}

export interface TrackInfo {
  name: string;
  artist: string;
  album?: {
    artist: string;
    title: string;
    images: TrackImage[];
  };
}
