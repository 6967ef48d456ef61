import dotenv from 'dotenv';
import { homedir } from 'os';
import { join } from 'path';
import { AppConfigSchema, type ValidatedAppConfig } from './schema.js';
import { ConfigurationError } from '../types/errors.js';

dotenv.config();

export const APP_NAME = 'media-scrobbler';
export const APPLE_MUSIC_ID = 'AppleInc.AppleMusicWin_nzyj5cmj7py4y!App';

// ~/.config/media-scrobbler/logs on linux, %APPDATA%\media-scrobbler\logs on windows
function defaultLogDirectory(): string {
  const base =
    process.env.APPDATA || process.env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, APP_NAME, 'logs');
}

function createConfig(): ValidatedAppConfig {
  const debug = process.env.SCROBBLER_DEBUG === 'true';

  const rawConfig = {
    lastfm: {
      apiRoot: process.env.LASTFM_API_ROOT || 'https://ws.audioscrobbler.com/2.0',
      timeout: parseInt(process.env.LASTFM_TIMEOUT_MS || '10000', 10),
      credentialAttempts: parseInt(process.env.LASTFM_CREDENTIAL_ATTEMPTS || '10', 10),
      retryBackoff: parseInt(process.env.LASTFM_RETRY_BACKOFF_MS || '1000', 10),
      minTime: parseInt(process.env.LASTFM_MIN_TIME_MS || '0', 10),
    },
    polling: {
      tickSeconds: parseInt(process.env.TICK_SECONDS || '5', 10),
    },
    player: {
      // playerctl reports names like 'spotify' or 'vlc', so filtering is opt-in
      onlyPrimary: process.env.ONLY_PRIMARY_PLAYER === 'true',
      primaryPlayerId: process.env.PRIMARY_PLAYER_ID || APPLE_MUSIC_ID,
    },
    secrets: {
      serviceName: process.env.SECRET_SERVICE_NAME || APP_NAME,
    },
    logging: {
      level: debug ? 'debug' : process.env.LOG_LEVEL || 'info',
      file: {
        enabled: process.env.LOG_FILE_ENABLED !== 'false',
        directory: process.env.LOG_DIR || defaultLogDirectory(),
        maxSize: 5_000_000,
        maxFiles: 3,
      },
    },
    dryRun: process.env.DRY_RUN === 'true',
  };

  try {
    return AppConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigurationError(`Invalid configuration: ${error.message}`);
    }
    throw new ConfigurationError('Unknown configuration validation error');
  }
}

export const config = createConfig();

export function printConfigSummary(): void {
  console.log('Configuration Summary:');
  console.log(`- Dry Run: ${config.dryRun ? 'YES' : 'NO'}`);
  console.log(`- Tick Interval: ${config.polling.tickSeconds}s`);
  console.log(`- Log Level: ${config.logging.level}`);
  console.log(
    `- Player Filter: ${config.player.onlyPrimary ? config.player.primaryPlayerId : 'any player'}`
  );
  console.log(`- LastFM API: ${config.lastfm.apiRoot}`);
  console.log(`- Log Directory: ${config.logging.file.enabled ? config.logging.file.directory : 'disabled'}`);
}
