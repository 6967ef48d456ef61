export interface RenderedStatus {
  title: string;
  subtitle: string;
  /** Unix seconds at which the track started, as seen from now */
  start: number;
  /** Unix seconds at which the track should end */
  end: number;
  artworkUrl?: string;
}
