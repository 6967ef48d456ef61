import { config } from '../config/index.js';
import { isSameTrack } from '../types/index.js';
import type { Action, PlaybackSample, TrackIdentity } from '../types/index.js';

export interface ScrobbleState {
  current: TrackIdentity | null;
  /** When the current occupancy began; reported as the scrobble timestamp */
  startedAt: Date | null;
  scrobbled: boolean;
  artworkUrl: string;
}

export interface Decision {
  state: ScrobbleState;
  actions: Action[];
  /** Whether the status display should show the sample or be cleared */
  display: 'show' | 'clear';
  isNewTrack: boolean;
}

export interface ScrobbleEngineOptions {
  /** When set, samples from any other player are treated as idle. */
  primaryPlayer?: string;
}

// LastFM only accepts scrobbles of tracks longer than 30s that were played past the halfway point
const MIN_SCROBBLE_LENGTH_SECONDS = 30;

const toSeconds = (us: number) => Math.floor(Math.max(0, us) / 1_000_000);

export class ScrobbleEngine {
  constructor(private readonly options: ScrobbleEngineOptions = {}) {}

  /** Engine honouring the configured player filter; `allPlayers` overrides it. */
  static fromConfig(allPlayers = false): ScrobbleEngine {
    const filterPlayers = config.player.onlyPrimary && !allPlayers;
    return new ScrobbleEngine({
      primaryPlayer: filterPlayers ? config.player.primaryPlayerId : undefined,
    });
  }

  static initialState(): ScrobbleState {
    return { current: null, startedAt: null, scrobbled: false, artworkUrl: '' };
  }

  static isEligible(state: ScrobbleState, sample: PlaybackSample): boolean {
    const songLength = toSeconds(sample.trackLengthUs);
    const elapsed = toSeconds(sample.positionUs);

    return (
      songLength > MIN_SCROBBLE_LENGTH_SECONDS &&
      elapsed > Math.floor(songLength / 2) &&
      !state.scrobbled
    );
  }

  /**
   * Sets the artwork for the current track. Ignored when the track has
   * changed since the fetch was queued or artwork is already present.
   */
  static applyArtwork(state: ScrobbleState, track: TrackIdentity, url: string): ScrobbleState {
    if (!url || state.artworkUrl || !isSameTrack(state.current, track)) {
      return state;
    }
    return { ...state, artworkUrl: url };
  }

  next(state: ScrobbleState, sample: PlaybackSample, now: Date): Decision {
    const { primaryPlayer } = this.options;
    const fromOtherPlayer = primaryPlayer !== undefined && sample.identity.playerName !== primaryPlayer;

    if (sample.status !== 'playing' || fromOtherPlayer) {
      return { state, actions: [], display: 'clear', isNewTrack: false };
    }

    const track = sample.identity;

    if (!isSameTrack(state.current, track)) {
      return {
        state: { current: track, startedAt: now, scrobbled: false, artworkUrl: '' },
        actions: [
          { type: 'nowPlaying', track },
          { type: 'fetchArtwork', track },
        ],
        display: 'show',
        isNewTrack: true,
      };
    }

    if (!ScrobbleEngine.isEligible(state, sample)) {
      return { state, actions: [], display: 'show', isNewTrack: false };
    }

    // Set before delivery is confirmed; a failed scrobble is not retried for this occupancy
    return {
      state: { ...state, scrobbled: true },
      actions: [{ type: 'scrobble', track, startedAt: state.startedAt ?? now }],
      display: 'show',
      isNewTrack: false,
    };
  }
}
