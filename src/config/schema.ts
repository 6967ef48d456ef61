import { z } from 'zod';

export const LastFmConfigSchema = z.object({
  apiRoot: z.string().url('LastFM API root must be a valid URL'),
  timeout: z.number().min(1000, 'LastFM timeout must be at least 1000ms'),
  credentialAttempts: z.number().int().min(1, 'At least one credential attempt is required'),
  retryBackoff: z.number().min(0),
  minTime: z.number().min(0),
});

export const PollingConfigSchema = z.object({
  tickSeconds: z.number().min(1, 'Tick interval must be at least 1 second'),
});

export const PlayerConfigSchema = z.object({
  onlyPrimary: z.boolean(),
  primaryPlayerId: z.string().min(1, 'Primary player id is required'),
});

export const SecretsConfigSchema = z.object({
  serviceName: z.string().min(1, 'Secret service name is required'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']),
  file: z.object({
    enabled: z.boolean(),
    directory: z.string().min(1, 'Log directory is required'),
    maxSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
});

export const AppConfigSchema = z.object({
  lastfm: LastFmConfigSchema,
  polling: PollingConfigSchema,
  player: PlayerConfigSchema,
  secrets: SecretsConfigSchema,
  logging: LoggingConfigSchema,
  dryRun: z.boolean(),
});

export type ValidatedAppConfig = z.infer<typeof AppConfigSchema>;
