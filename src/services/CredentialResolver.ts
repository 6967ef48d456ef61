import { z } from 'zod';
import { config } from '../config/index.js';
import { CredentialsError, LastFmApiError, SecretStoreError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import { LastFmHttpClient } from './LastFmHttpClient.js';
import type { SecretName, SecretStore } from './SecretStore.js';
import type { AccountCredentials, Credentials } from '../types/index.js';

export const API_KEY_VAR = 'SCROBBLER_API_KEY';
export const USERNAME_VAR = 'SCROBBLER_USERNAME';
export const PASSWORD_VAR = 'SCROBBLER_PASSWORD';
export const API_SECRET_VAR = 'SCROBBLER_API_SECRET';

const MobileSessionSchema = z.object({
  session: z.object({
    name: z.string(),
    key: z.string().min(1),
    subscriber: z.number().optional(),
  }),
});

export interface CredentialResolverOptions {
  store: SecretStore;
  http?: LastFmHttpClient;
  env?: NodeJS.ProcessEnv;
  retryBackoff?: number;
  delay?: (ms: number) => Promise<void>;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class CredentialResolver {
  private readonly store: SecretStore;
  private readonly http: LastFmHttpClient;
  private readonly env: NodeJS.ProcessEnv;
  private readonly retryBackoff: number;
  private readonly delay: (ms: number) => Promise<void>;

  constructor(options: CredentialResolverOptions) {
    this.store = options.store;
    this.http = options.http ?? new LastFmHttpClient();
    this.env = options.env ?? process.env;
    this.retryBackoff = options.retryBackoff ?? config.lastfm.retryBackoff;
    this.delay = options.delay ?? sleep;
  }

  /**
   * Resolves credentials, retrying the session bootstrap up to `attempts`
   * times when it fails for a transient reason. Configuration problems and
   * non-transient HTTP failures end the loop immediately.
   */
  async resolve(attempts: number = config.lastfm.credentialAttempts): Promise<Credentials> {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.resolveOnce();
      } catch (error) {
        if (!(error instanceof LastFmApiError)) {
          throw error;
        }

        if (!error.retryable) {
          throw new CredentialsError('http', error.message, { ...error.context, attempt });
        }

        Logger.debug('LastFM session request failed, will retry', {
          attempt,
          attempts,
          error: error.message,
        });

        if (attempt < attempts) {
          await this.delay(this.retryBackoff);
        }
      }
    }

    throw CredentialsError.exhausted(attempts);
  }

  private async resolveOnce(): Promise<Credentials> {
    const account = await this.readAccount();
    const cached = await this.read('sessionToken');

    if (cached) {
      Logger.debug('Using cached LastFM session token');
      return { ...this.withoutPassword(account), sessionToken: cached };
    }

    const sessionToken = await this.requestSession(account);
    await this.write('sessionToken', sessionToken);
    Logger.info('LastFM session token obtained and stored', { username: account.username });

    return { ...this.withoutPassword(account), sessionToken };
  }

  private async readAccount(): Promise<AccountCredentials> {
    const apiKey = this.requireEnv(API_KEY_VAR);
    const username = this.requireEnv(USERNAME_VAR);

    const password = (await this.read('password')) || this.env[PASSWORD_VAR];
    if (!password) throw CredentialsError.missingPassword();

    const apiSecret = (await this.read('apiSecret')) || this.env[API_SECRET_VAR];
    if (!apiSecret) throw CredentialsError.missingApiSecret();

    return { apiKey, apiSecret, username, password };
  }

  private async requestSession(account: AccountCredentials): Promise<string> {
    const response = await this.http.post(
      {
        method: 'auth.getMobileSession',
        api_key: account.apiKey,
        password: account.password,
        username: account.username,
      },
      account.apiSecret,
      MobileSessionSchema
    );

    return response.session.key;
  }

  private requireEnv(variable: string): string {
    const value = this.env[variable];
    if (!value) throw CredentialsError.missingEnv(variable);
    return value;
  }

  private async read(name: SecretName): Promise<string | null> {
    try {
      return await this.store.get(name);
    } catch (error) {
      throw this.keyringError(error);
    }
  }

  private async write(name: SecretName, value: string): Promise<void> {
    try {
      await this.store.set(name, value);
    } catch (error) {
      throw this.keyringError(error);
    }
  }

  private keyringError(error: unknown): CredentialsError {
    const message = error instanceof Error ? error.message : String(error);
    return new CredentialsError('keyring', message, {
      cause: error instanceof SecretStoreError ? error.context : undefined,
    });
  }

  private withoutPassword(account: AccountCredentials): Omit<Credentials, 'sessionToken'> {
    return { apiKey: account.apiKey, apiSecret: account.apiSecret, username: account.username };
  }
}
