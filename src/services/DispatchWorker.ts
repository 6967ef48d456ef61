import Bottleneck from 'bottleneck';
import { config } from '../config/index.js';
import { LastFmService } from './LastFmService.js';
import { Logger, describeError } from '../utils/logger.js';
import { describeTrack } from '../types/index.js';
import type { Action, TrackIdentity } from '../types/index.js';

/** The subset of the LastFM client the worker calls. */
export type ScrobbleClient = Pick<LastFmService, 'nowPlaying' | 'scrobble' | 'getTrackInfo'>;

export interface DispatchWorkerOptions {
  onArtwork?: (track: TrackIdentity, url: string) => void;
  /** Minimum gap between two LastFM calls, in milliseconds */
  minTime?: number;
  dryRun?: boolean;
}

/**
 * Single consumer for the actions produced by the decision engine. Work is
 * run one action at a time in arrival order; failures are logged and dropped.
 */
export class DispatchWorker {
  private readonly limiter: Bottleneck;
  private readonly pending = new Set<Promise<void>>();
  private closed = false;

  constructor(
    private readonly client: ScrobbleClient,
    private readonly options: DispatchWorkerOptions = {}
  ) {
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: options.minTime ?? config.lastfm.minTime,
    });
  }

  /** Queues an action and returns immediately. */
  enqueue(action: Action): void {
    if (this.closed) {
      Logger.warn('Dispatch worker is closed, dropping action', { action: action.type });
      return;
    }

    const job = this.limiter
      .schedule(() => this.execute(action))
      .catch((error: unknown) => {
        Logger.error(`LastFM ${action.type} failed for ${describeTrack(action.track)}`, {
          error: describeError(error),
        });
      })
      .finally(() => {
        this.pending.delete(job);
      });

    this.pending.add(job);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Resolves once every action queued so far has been handled. */
  async onIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.onIdle();
    await this.limiter.stop({ dropWaitingJobs: false });
  }

  private async execute(action: Action): Promise<void> {
    const { track } = action;

    if (this.options.dryRun) {
      Logger.info(`[DRY RUN] Would send ${action.type}: ${describeTrack(track)}`);
      return;
    }

    switch (action.type) {
      case 'nowPlaying':
        await this.client.nowPlaying(track.artistName, track.songName, track.albumName);
        Logger.info(`LastFM Now Playing: ${track.songName} - ${track.artistName}`);
        break;

      case 'fetchArtwork': {
        const info = await this.client.getTrackInfo(track.artistName, track.songName);
        Logger.debug('Got track info from LastFM', { info });

        const url = LastFmService.pickArtwork(info);
        if (url) {
          this.options.onArtwork?.(track, url);
        }
        break;
      }

      case 'scrobble':
        await this.client.scrobble(
          track.artistName,
          track.songName,
          action.startedAt,
          track.albumName
        );
        Logger.info(`Song, ${track.songName} by ${track.artistName} has been scrobbled!`);
        break;
    }
  }
}
