import dayjs from 'dayjs';
import { z } from 'zod';
import { LastFmHttpClient } from './LastFmHttpClient.js';
import { Logger } from '../utils/logger.js';
import type { Credentials, RequestParams, TrackInfo } from '../types/index.js';

// Mutations answer with a body we do not use; anything JSON will do.
const AcknowledgementSchema = z.unknown();

const ImageSchema = z
  .object({
    size: z.string(),
    url: z.string().optional(),
    '#text': z.string().optional(),
  })
  .transform((image) => ({ size: image.size, url: image.url ?? image['#text'] ?? '' }));

const TrackInfoResponseSchema = z
  .object({
    track: z.object({
      name: z.string(),
      artist: z.object({ name: z.string() }),
      album: z
        .object({
          artist: z.string(),
          title: z.string(),
          image: z.array(ImageSchema).optional(),
          images: z.array(ImageSchema).optional(),
        })
        .optional(),
    }),
  })
  .transform(({ track }): TrackInfo => ({
    name: track.name,
    artist: track.artist.name,
    album: track.album && {
      artist: track.album.artist,
      title: track.album.title,
      images: track.album.images ?? track.album.image ?? [],
    },
  }));

export class LastFmService {
  constructor(
    private readonly credentials: Credentials,
    private readonly http: LastFmHttpClient = new LastFmHttpClient()
  ) {}

  async nowPlaying(artist: string, track: string, album?: string): Promise<void> {
    const params: RequestParams = {
      method: 'track.updateNowPlaying',
      artist,
      track,
      api_key: this.credentials.apiKey,
      sk: this.credentials.sessionToken,
    };
    if (album) params.album = album;

    await this.http.post(params, this.credentials.apiSecret, AcknowledgementSchema);
    Logger.debug('Now playing updated', { artist, track });
  }

  /** `timestamp` is when playback of the track began. */
  async scrobble(artist: string, track: string, timestamp: Date, album?: string): Promise<void> {
    const params: RequestParams = {
      method: 'track.scrobble',
      artist,
      track,
      timestamp: String(dayjs(timestamp).unix()),
      api_key: this.credentials.apiKey,
      sk: this.credentials.sessionToken,
    };
    if (album) params.album = album;

    await this.http.post(params, this.credentials.apiSecret, AcknowledgementSchema);
    Logger.debug('Scrobble accepted', { artist, track });
  }

  async getTrackInfo(artist: string, track: string): Promise<TrackInfo> {
    return this.http.get(
      {
        method: 'track.getInfo',
        artist,
        track,
        api_key: this.credentials.apiKey,
      },
      TrackInfoResponseSchema
    );
  }

  static pickArtwork(info: TrackInfo, size = 'large'): string {
    return info.album?.images.find((image) => image.size === size)?.url ?? '';
  }
}
