import { z } from 'zod';
import { config } from '../config/index.js';
import { LastFmApiError } from '../types/errors.js';
import { Logger, describeError } from '../utils/logger.js';
import { RequestSigner } from './RequestSigner.js';
import type { RequestParams } from '../types/index.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Any schema that parses raw JSON into `T`, transforms included. */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface LastFmHttpOptions {
  apiRoot?: string;
  timeout?: number;
  fetch?: FetchLike;
}

const ErrorEnvelopeSchema = z.object({
  error: z.number(),
  message: z.string(),
});

/**
 * Request plumbing shared by the session bootstrap and the LastFM client:
 * signing, form/query construction, status checks and JSON/zod parsing.
 */
export class LastFmHttpClient {
  private readonly apiRoot: string;
  private readonly timeout: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: LastFmHttpOptions = {}) {
    this.apiRoot = options.apiRoot ?? config.lastfm.apiRoot;
    this.timeout = options.timeout ?? config.lastfm.timeout;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Signed, form-encoded POST. */
  async post<T>(params: RequestParams, secret: string, schema: ResponseSchema<T>): Promise<T> {
    const request = RequestSigner.signRequest(params, secret);
    Logger.debug('LastFM POST', { method: params.method, api_sig: request.signature });

    return this.send(
      `${this.apiRoot}/`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: request.body,
      },
      params.method,
      schema
    );
  }

  /** Unsigned GET with the parameters in the query string. */
  async get<T>(params: RequestParams, schema: ResponseSchema<T>): Promise<T> {
    const uri = RequestSigner.buildUri(this.apiRoot, params);
    Logger.debug('LastFM GET', { uri });

    return this.send(uri, { method: 'GET' }, params.method, schema);
  }

  private async send<T>(
    uri: string,
    init: RequestInit,
    method: string | undefined,
    schema: ResponseSchema<T>
  ): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchImpl(uri, {
        ...init,
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      throw new LastFmApiError('transport', describeError(error), undefined, { method });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new LastFmApiError('transport', describeError(error), response.status, { method });
    }

    // 4xx/5xx are failures whatever the body says
    if (response.status >= 400) {
      throw new LastFmApiError('status', `HTTP ${response.status} for ${method}`, response.status, {
        method,
        body: body.slice(0, 500),
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new LastFmApiError('protocol', `Response for ${method} is not JSON`, response.status, {
        method,
        body: body.slice(0, 500),
      });
    }

    const envelope = ErrorEnvelopeSchema.safeParse(json);
    if (envelope.success) {
      throw new LastFmApiError(
        'api',
        `${envelope.data.message} (code ${envelope.data.error})`,
        response.status,
        { method, code: envelope.data.error }
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new LastFmApiError(
        'protocol',
        `Unexpected response shape for ${method}: ${parsed.error.message}`,
        response.status,
        { method }
      );
    }

    return parsed.data;
  }
}
