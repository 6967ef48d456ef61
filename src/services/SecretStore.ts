import { Entry } from '@napi-rs/keyring';
import { config } from '../config/index.js';
import { SecretStoreError } from '../types/errors.js';

export type SecretName = 'password' | 'apiSecret' | 'sessionToken';

export interface SecretStore {
  /** Resolves to null when no entry exists; rejects with SecretStoreError otherwise. */
  get(name: SecretName): Promise<string | null>;
  set(name: SecretName, value: string): Promise<void>;
}

/** Secrets kept in the OS credential manager (Keychain, Credential Manager, Secret Service). */
export class KeyringSecretStore implements SecretStore {
  constructor(private readonly serviceName: string = config.secrets.serviceName) {}

  async get(name: SecretName): Promise<string | null> {
    try {
      const value = this.entry(name).getPassword();
      return value ?? null;
    } catch (error) {
      throw new SecretStoreError(`Could not read ${name} from keyring`, {
        service: this.serviceName,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async set(name: SecretName, value: string): Promise<void> {
    try {
      this.entry(name).setPassword(value);
    } catch (error) {
      throw new SecretStoreError(`Could not write ${name} to keyring`, {
        service: this.serviceName,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private entry(name: SecretName): Entry {
    return new Entry(this.serviceName, name);
  }
}
