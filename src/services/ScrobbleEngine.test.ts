import { describe, it, expect } from 'vitest';
import { ScrobbleEngine, type ScrobbleState } from './ScrobbleEngine.js';
import { PlayerctlPoller } from './PlayerctlPoller.js';
import type { MediaStatus, PlaybackSample, TrackIdentity } from '../types/index.js';

const SECOND = 1_000_000;

const track: TrackIdentity = {
  playerName: 'test-player',
  artistName: 'Khruangbin',
  songName: 'Maria También',
  albumName: 'Con Todo El Mundo',
};

function sample(
  positionSeconds: number,
  lengthSeconds = 40,
  status: MediaStatus = 'playing',
  identity: TrackIdentity = track
): PlaybackSample {
  return {
    identity,
    status,
    mediaType: 'music',
    trackLengthUs: lengthSeconds * SECOND,
    positionUs: positionSeconds * SECOND,
  };
}

const t0 = new Date('2026-01-01T12:00:00Z');
const t1 = new Date('2026-01-01T12:00:25Z');

function playing(engine: ScrobbleEngine, lengthSeconds = 40): ScrobbleState {
  return engine.next(ScrobbleEngine.initialState(), sample(0, lengthSeconds), t0).state;
}

describe('ScrobbleEngine', () => {
  const engine = new ScrobbleEngine();

  describe('new tracks', () => {
    it('emits now playing and artwork fetch for a new track', () => {
      const decision = engine.next(ScrobbleEngine.initialState(), sample(0), t0);

      expect(decision.isNewTrack).toBe(true);
      expect(decision.display).toBe('show');
      expect(decision.actions).toEqual([
        { type: 'nowPlaying', track },
        { type: 'fetchArtwork', track },
      ]);
      expect(decision.state).toEqual({
        current: track,
        startedAt: t0,
        scrobbled: false,
        artworkUrl: '',
      });
    });

    it('does not repeat now playing when only the position changes', () => {
      const state = playing(engine);
      const decision = engine.next(state, sample(5), t1);

      expect(decision.isNewTrack).toBe(false);
      expect(decision.actions).toEqual([]);
      expect(decision.state.startedAt).toBe(t0);
    });

    it('treats a different album as a different track', () => {
      const state = playing(engine);
      const other = { ...track, albumName: 'Mordechai' };
      const decision = engine.next(state, sample(5, 40, 'playing', other), t1);

      expect(decision.isNewTrack).toBe(true);
      expect(decision.state.startedAt).toBe(t1);
    });

    it('resets scrobbled and artwork when the track changes', () => {
      const state: ScrobbleState = {
        current: track,
        startedAt: t0,
        scrobbled: true,
        artworkUrl: 'https://img.test/large.png',
      };
      const other = { ...track, songName: 'Evan Finds the Third Room' };
      const decision = engine.next(state, sample(0, 40, 'playing', other), t1);

      expect(decision.state).toEqual({
        current: other,
        startedAt: t1,
        scrobbled: false,
        artworkUrl: '',
      });
    });
  });

  describe('scrobble threshold', () => {
    it('waits until more than half of a 40 second track has played', () => {
      const state = playing(engine);

      expect(engine.next(state, sample(19), t1).actions).toEqual([]);
      expect(engine.next(state, sample(20), t1).actions).toEqual([]);
    });

    it('scrobbles exactly once per occupancy, stamped with the start time', () => {
      const state = playing(engine);

      const first = engine.next(state, sample(21), t1);
      expect(first.actions).toEqual([{ type: 'scrobble', track, startedAt: t0 }]);
      expect(first.state.scrobbled).toBe(true);

      const later = engine.next(first.state, sample(35), t1);
      expect(later.actions).toEqual([]);
      expect(later.state.scrobbled).toBe(true);
    });

    it('never scrobbles tracks of 30 seconds or less', () => {
      const state = playing(engine, 30);

      expect(engine.next(state, sample(29, 30), t1).actions).toEqual([]);
      expect(engine.next(state, sample(30, 30), t1).actions).toEqual([]);
    });

    it('uses integer seconds when halving the length', () => {
      // 41s track: floor(41 / 2) = 20, so 21s is enough
      const state = playing(engine, 41);

      expect(engine.next(state, sample(20.9, 41), t1).actions).toEqual([]);
      expect(engine.next(state, sample(21, 41), t1).actions).toHaveLength(1);
    });
  });

  describe('idle samples', () => {
    it('clears the display without touching state when paused', () => {
      const scrobbled = engine.next(playing(engine), sample(21), t1).state;
      const decision = engine.next(scrobbled, sample(22, 40, 'paused'), t1);

      expect(decision.display).toBe('clear');
      expect(decision.actions).toEqual([]);
      expect(decision.state).toBe(scrobbled);
      expect(decision.state.scrobbled).toBe(true);
    });

    it('does not restart the occupancy when playback resumes', () => {
      const state = playing(engine);
      const paused = engine.next(state, sample(10, 40, 'paused'), t1).state;
      const resumed = engine.next(paused, sample(11), t1);

      expect(resumed.isNewTrack).toBe(false);
      expect(resumed.state.startedAt).toBe(t0);
    });

    it('ignores other players when filtering to a primary player', () => {
      const filtered = new ScrobbleEngine({ primaryPlayer: 'primary-player' });
      const decision = filtered.next(ScrobbleEngine.initialState(), sample(0), t0);

      expect(decision.display).toBe('clear');
      expect(decision.actions).toEqual([]);
      expect(decision.state.current).toBeNull();
    });

    it('accepts the primary player when filtering', () => {
      const filtered = new ScrobbleEngine({ primaryPlayer: 'test-player' });
      const decision = filtered.next(ScrobbleEngine.initialState(), sample(0), t0);

      expect(decision.isNewTrack).toBe(true);
    });
  });

  describe('applyArtwork', () => {
    it('sets artwork for the current track once', () => {
      const state = playing(engine);
      const withArt = ScrobbleEngine.applyArtwork(state, track, 'https://img.test/a.png');

      expect(withArt.artworkUrl).toBe('https://img.test/a.png');
      expect(ScrobbleEngine.applyArtwork(withArt, track, 'https://img.test/b.png')).toBe(withArt);
    });

    it('drops artwork that arrives after the track changed', () => {
      const state = playing(engine);
      const stale = { ...track, songName: 'Something Else' };

      expect(ScrobbleEngine.applyArtwork(state, stale, 'https://img.test/a.png')).toBe(state);
    });
  });

  describe('fromConfig', () => {
    it('accepts samples from playerctl players under the default configuration', () => {
      const parsed = PlayerctlPoller.parse('spotify\tPlaying\tArtist\tSong\tAlbum\t200000000\t0');
      expect(parsed).not.toBeNull();
      if (!parsed) return;

      const decision = ScrobbleEngine.fromConfig().next(ScrobbleEngine.initialState(), parsed, t0);

      expect(decision.display).toBe('show');
      expect(decision.actions.map((action) => action.type)).toEqual(['nowPlaying', 'fetchArtwork']);
    });
  });
});
