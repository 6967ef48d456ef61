import type { TrackIdentity } from './media.js';

export type Action =
  | { type: 'nowPlaying'; track: TrackIdentity }
  | { type: 'fetchArtwork'; track: TrackIdentity }
  | { type: 'scrobble'; track: TrackIdentity; startedAt: Date };
