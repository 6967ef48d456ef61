import { config } from '../config/index.js';
import { DispatchWorker, type ScrobbleClient } from './DispatchWorker.js';
import { ScrobbleEngine, type ScrobbleState } from './ScrobbleEngine.js';
import { StatusPresenter } from './StatusPresenter.js';
import { Logger, describeError } from '../utils/logger.js';
import { isSameTrack } from '../types/index.js';
import type { MediaPoller } from './PlayerctlPoller.js';
import type { Action, CLIOptions, PlaybackSample, TrackIdentity } from '../types/index.js';

export interface ScrobbleWorkflowOptions {
  poller: MediaPoller;
  presenter: StatusPresenter;
  engine?: ScrobbleEngine;
  /** Null when credentials could not be resolved; the status display still runs. */
  client: ScrobbleClient | null;
  tickSeconds?: number;
  dryRun?: boolean;
  clock?: () => Date;
}

export class ScrobbleWorkflow {
  private readonly poller: MediaPoller;
  private readonly presenter: StatusPresenter;
  private readonly engine: ScrobbleEngine;
  private readonly worker: DispatchWorker | null;
  private readonly tickSeconds: number;
  private readonly clock: () => Date;

  private state: ScrobbleState = ScrobbleEngine.initialState();
  private lastSample: PlaybackSample | null = null;
  private shouldStop = false;
  private wake: (() => void) | null = null;

  constructor(options: ScrobbleWorkflowOptions) {
    this.poller = options.poller;
    this.presenter = options.presenter;
    this.engine = options.engine ?? new ScrobbleEngine();
    this.tickSeconds = options.tickSeconds ?? config.polling.tickSeconds;
    this.clock = options.clock ?? (() => new Date());
    this.worker = options.client
      ? new DispatchWorker(options.client, {
          dryRun: options.dryRun ?? config.dryRun,
          onArtwork: (track, url) => this.handleArtwork(track, url),
        })
      : null;
  }

  get scrobbleState(): ScrobbleState {
    return this.state;
  }

  get scrobblingEnabled(): boolean {
    return this.worker !== null;
  }

  async run(options: CLIOptions): Promise<void> {
    Logger.info('🎵 Starting media scrobbler', {
      scrobbling: this.scrobblingEnabled,
      tickSeconds: this.tickSeconds,
    });

    try {
      if (options.once) {
        await this.tick();
      } else {
        await this.runContinuous();
      }
    } finally {
      await this.worker?.close();
    }
  }

  /** Ends the tick loop after the current tick. */
  stop(): void {
    this.shouldStop = true;
    this.wake?.();
  }

  /** Polls once, advances the engine, updates the display and queues LastFM work. */
  async tick(): Promise<void> {
    let sample: PlaybackSample | null;
    try {
      sample = await this.poller.poll();
    } catch (error) {
      Logger.error('Error while trying to get currently playing media', {
        error: describeError(error),
      });
      return;
    }

    if (!sample) {
      Logger.debug('No media is paused or playing');
      return;
    }

    const now = this.clock();
    const decision = this.engine.next(this.state, sample, now);
    this.state = decision.state;

    if (decision.display === 'clear') {
      this.lastSample = null;
      await this.presenter.clear();
      return;
    }

    if (decision.isNewTrack) {
      const { playerName, songName, artistName, albumName } = sample.identity;
      Logger.info(`App currently playing media: ${playerName}`);
      Logger.info(`Currently Playing: ${songName} by ${artistName} on ${albumName}`);
    }

    this.lastSample = sample;
    decision.actions.forEach((action) => this.dispatch(action));
    await this.presenter.show(sample, this.state.artworkUrl, now);
  }

  /** Waits for queued LastFM work; used by tests and shutdown. */
  async flush(): Promise<void> {
    await this.worker?.onIdle();
  }

  private dispatch(action: Action): void {
    if (!this.worker) {
      Logger.debug(`Scrobbling disabled, skipping ${action.type}`);
      return;
    }
    this.worker.enqueue(action);
  }

  private handleArtwork(track: TrackIdentity, url: string): void {
    const updated = ScrobbleEngine.applyArtwork(this.state, track, url);
    if (updated === this.state) return;

    this.state = updated;
    if (this.lastSample && isSameTrack(this.lastSample.identity, track)) {
      Logger.info(`Status img updated to: ${url}`);
      void this.presenter.show(this.lastSample, url, this.clock());
    }
  }

  private async runContinuous(): Promise<void> {
    while (!this.shouldStop) {
      await this.tick();
      if (this.shouldStop) break;
      await this.sleep(this.tickSeconds * 1000);
    }

    Logger.info('🛑 Stop requested - exiting tick loop');
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);

      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
