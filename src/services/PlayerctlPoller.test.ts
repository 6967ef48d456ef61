import { describe, it, expect } from 'vitest';
import { PlayerctlPoller } from './PlayerctlPoller.js';

describe('PlayerctlPoller.parse', () => {
  it('maps playerctl metadata to a playback sample', () => {
    const output = 'mpd\tPlaying\tArtist\tSong\tAlbum\t215000000\t12500000\n';

    expect(PlayerctlPoller.parse(output)).toEqual({
      identity: {
        playerName: 'mpd',
        artistName: 'Artist',
        songName: 'Song',
        albumName: 'Album',
      },
      status: 'playing',
      mediaType: 'music',
      trackLengthUs: 215000000,
      positionUs: 12500000,
    });
  });

  it('maps paused players and missing lengths', () => {
    const sample = PlayerctlPoller.parse('vlc\tPaused\tArtist\tSong\t\t\t0');

    expect(sample?.status).toBe('paused');
    expect(sample?.identity.albumName).toBe('');
    expect(sample?.trackLengthUs).toBe(0);
  });

  it('treats unknown statuses as closed', () => {
    expect(PlayerctlPoller.parse('mpv\tBuffering\tA\tB\tC\t1\t1')?.status).toBe('closed');
  });

  it('returns null for empty output', () => {
    expect(PlayerctlPoller.parse('\n')).toBeNull();
  });
});
