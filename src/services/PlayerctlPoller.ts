import { execFile } from 'child_process';
import { promisify } from 'util';
import { MediaPollError } from '../types/errors.js';
import type { MediaStatus, PlaybackSample } from '../types/index.js';

const execFileAsync = promisify(execFile);

export interface MediaPoller {
  /** Resolves to null when nothing is open. */
  poll(): Promise<PlaybackSample | null>;
}

const FIELDS = [
  '{{playerName}}',
  '{{status}}',
  '{{artist}}',
  '{{title}}',
  '{{album}}',
  '{{mpris:length}}',
  '{{position}}',
];

const STATUS_MAP: Record<string, MediaStatus> = {
  Playing: 'playing',
  Paused: 'paused',
  Stopped: 'stopped',
};

/**
 * Reads the active MPRIS player through `playerctl`. Lengths and positions
 * are reported in microseconds already.
 */
export class PlayerctlPoller implements MediaPoller {
  constructor(
    private readonly command = 'playerctl',
    private readonly timeout = 2000
  ) {}

  async poll(): Promise<PlaybackSample | null> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(
        this.command,
        ['metadata', '--format', FIELDS.join('\t')],
        { timeout: this.timeout }
      ));
    } catch (error) {
      const stderr =
        error && typeof error === 'object' && 'stderr' in error ? String(error.stderr) : '';
      if (stderr.includes('No players found')) {
        return null;
      }
      throw new MediaPollError(error instanceof Error ? error.message : String(error), {
        command: this.command,
      });
    }

    return PlayerctlPoller.parse(stdout);
  }

  static parse(output: string): PlaybackSample | null {
    const line = output.split('\n')[0] ?? '';
    if (!line.trim()) return null;

    const [playerName = '', status = '', artistName = '', songName = '', albumName = '', length = '', position = ''] =
      line.split('\t');

    return {
      identity: { playerName, artistName, songName, albumName },
      status: STATUS_MAP[status] ?? 'closed',
      mediaType: 'music',
      trackLengthUs: parseInt(length, 10) || 0,
      positionUs: parseInt(position, 10) || 0,
    };
  }
}
