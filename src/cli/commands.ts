import { Command } from 'commander';
import { createInterface } from 'readline/promises';
import { config, printConfigSummary } from '../config/index.js';
import { CredentialResolver } from '../services/CredentialResolver.js';
import { LastFmService } from '../services/LastFmService.js';
import { LoggingStatusSink, StatusPresenter } from '../services/StatusPresenter.js';
import { PlayerctlPoller } from '../services/PlayerctlPoller.js';
import { ScrobbleEngine } from '../services/ScrobbleEngine.js';
import { ScrobbleWorkflow } from '../services/ScrobbleWorkflow.js';
import { KeyringSecretStore, type SecretName, type SecretStore } from '../services/SecretStore.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { Logger } from '../utils/logger.js';
import type { CLIOptions } from '../types/index.js';

async function promptedInput(prompt: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(prompt)).trim();
  } finally {
    rl.close();
  }
}

async function storeSecret(store: SecretStore, name: SecretName, prompt: string): Promise<void> {
  const value = await promptedInput(prompt);
  if (!value) {
    Logger.warn(`Empty input, ${name} was not changed`);
    return;
  }
  await store.set(name, value);
  Logger.info(`${name === 'password' ? 'Password' : 'Secret'} has been set!`);
}

/** Resolves LastFM credentials, or returns null and leaves scrobbling off. */
async function connectLastFm(store: SecretStore): Promise<LastFmService | null> {
  try {
    const credentials = await new CredentialResolver({ store }).resolve(
      config.lastfm.credentialAttempts
    );
    Logger.info('Got LastFM credentials', { username: credentials.username });
    return new LastFmService(credentials);
  } catch (error) {
    Logger.error(
      `LastFM support not enabled: ${error instanceof Error ? error.message : String(error)}`
    );
    return null;
  }
}

export async function runScrobbler(options: CLIOptions): Promise<void> {
  if (options.verbose) {
    Logger.setLevel('debug');
    printConfigSummary();
  }

  const store = new KeyringSecretStore();

  if (options.password || options.secret) {
    if (options.password) await storeSecret(store, 'password', 'Password: ');
    if (options.secret) await storeSecret(store, 'apiSecret', 'API Secret: ');
    return;
  }

  const workflow = new ScrobbleWorkflow({
    poller: new PlayerctlPoller(),
    presenter: new StatusPresenter(new LoggingStatusSink()),
    engine: ScrobbleEngine.fromConfig(options.allPlayers),
    client: await connectLastFm(store),
    dryRun: options.dryRun ?? config.dryRun,
  });

  ErrorHandler.onShutdown(async () => {
    workflow.stop();
    await workflow.flush();
  });

  await workflow.run(options);
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('media-scrobbler')
    .description('Scrobble locally playing media to LastFM and show it as your status')
    .version('0.1.0')
    .option('-p, --password', 'prompt for the LastFM password and store it in the keyring')
    .option('-s, --secret', 'prompt for the LastFM API secret and store it in the keyring')
    .option('--once', 'poll a single time and exit')
    .option('--all-players', 'accept media from any player even when ONLY_PRIMARY_PLAYER is set')
    .option('--dry-run', 'log LastFM calls instead of sending them')
    .option('-v, --verbose', 'enable debug logging')
    .action(async (options: CLIOptions) => {
      await runScrobbler(options);
    });

  return program;
}
