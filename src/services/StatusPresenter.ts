import dayjs from 'dayjs';
import { Logger, describeError } from '../utils/logger.js';
import type { PlaybackSample, RenderedStatus } from '../types/index.js';

export interface StatusSink {
  show(status: RenderedStatus): Promise<void>;
  clear(): Promise<void>;
}

/** Default sink for hosts without a rich-presence client. */
export class LoggingStatusSink implements StatusSink {
  private lastShown: string | null = null;

  async show(status: RenderedStatus): Promise<void> {
    // start/end move on every tick; only a new track or new artwork is worth a line
    const key = [status.title, status.subtitle, status.artworkUrl ?? ''].join('\n');
    if (key === this.lastShown) return;

    this.lastShown = key;
    Logger.info(`Activity set to listening to ${status.subtitle} - ${status.title}`, {
      until: dayjs.unix(status.end).format('HH:mm:ss'),
      artwork: status.artworkUrl,
    });
  }

  async clear(): Promise<void> {
    if (this.lastShown === null) return;

    this.lastShown = null;
    Logger.debug('Media is paused. Clearing activity');
  }
}

export class StatusPresenter {
  constructor(private readonly sink: StatusSink) {}

  static render(sample: PlaybackSample, artworkUrl: string, now: Date): RenderedStatus {
    const nowUs = now.getTime() * 1000;
    const position = Math.max(0, sample.positionUs);
    const remaining = Math.max(0, sample.trackLengthUs - position);
    const { songName, artistName, albumName } = sample.identity;

    const status: RenderedStatus = {
      title: songName,
      subtitle: `${artistName} - ${albumName}`,
      start: Math.floor((nowUs - position) / 1_000_000),
      end: Math.floor((nowUs + remaining) / 1_000_000),
    };

    if (artworkUrl) {
      status.artworkUrl = artworkUrl;
    }

    return status;
  }

  async show(sample: PlaybackSample, artworkUrl: string, now: Date): Promise<void> {
    try {
      await this.sink.show(StatusPresenter.render(sample, artworkUrl, now));
    } catch (error) {
      Logger.error('Error while setting activity', { error: describeError(error) });
    }
  }

  async clear(): Promise<void> {
    try {
      await this.sink.clear();
    } catch (error) {
      Logger.error('Error while clearing activity', { error: describeError(error) });
    }
  }
}
