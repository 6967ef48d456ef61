export type MediaStatus = 'closed' | 'opened' | 'changing' | 'stopped' | 'playing' | 'paused';

export type MediaType = 'unknown' | 'music' | 'video' | 'image';

export interface TrackIdentity {
  readonly playerName: string;
  readonly artistName: string;
  readonly songName: string;
  readonly albumName: string;
}

export interface PlaybackSample {
  identity: TrackIdentity;
  status: MediaStatus;
  mediaType: MediaType;
  /** Length of the media in microseconds */
  trackLengthUs: number;
  /** How far playback has progressed, in microseconds */
  positionUs: number;
}

/**
 * Two samples describe the same track when player, artist, song and album all
 * match. Playback position and length are deliberately ignored.
 */
export function isSameTrack(a: TrackIdentity | null, b: TrackIdentity | null): boolean {
  if (a === null || b === null) return a === b;

  return (
    a.playerName === b.playerName &&
    a.artistName === b.artistName &&
    a.songName === b.songName &&
    a.albumName === b.albumName
  );
}

export function describeTrack(track: TrackIdentity): string {
  return `${track.artistName} - ${track.songName}`;
}
