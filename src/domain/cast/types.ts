/**
 * Snapshot shapes for the two status streams a Cast receiver pushes:
 * the receiver (running app + volume) and the media session.
 */

export type PlayerState = 'PLAYING' | 'PAUSED' | 'BUFFERING' | 'IDLE' | 'UNKNOWN';

export interface CastStatus {
  appId: string | null;
  displayName: string | null;
  iconUrl: string | null;
  statusText: string | null;
  sessionId: string | null;
  transportId: string | null;
  namespaces: string[];
  /** 0..1 */
  volumeLevel: number;
  volumeMuted: boolean;
}

export interface MediaImage {
  url: string;
  width?: number;
  height?: number;
}

export interface MediaStatus {
  mediaSessionId: number | null;
  contentId: string | null;
  contentType: string | null;
  playerState: PlayerState;
  idleReason: string | null;
  /** seconds, as of `lastUpdated` */
  currentTime: number | null;
  /** seconds; null when the receiver does not report one */
  duration: number | null;
  playbackRate: number;
  supportedMediaCommands: number;
  metadataType: number | null;
  title: string | null;
  artist: string | null;
  albumName: string | null;
  trackNumber: number | null;
  images: MediaImage[];
  metadata: Record<string, unknown>;
  /** epoch ms when this snapshot was received */
  lastUpdated: number;
}

export const MEDIA_COMMANDS = {
  PAUSE: 1,
  SEEK: 2,
  STREAM_VOLUME: 4,
  STREAM_MUTE: 8,
  QUEUE_NEXT: 64,
  QUEUE_PREV: 128,
} as const;

export enum MediaType {
  Generic = 'generic',
  Movie = 'movie',
  TvShow = 'tvshow',
  MusicTrack = 'musictrack',
  Photo = 'photo',
}

export const METADATA_TYPES: Record<number, MediaType> = {
  0: MediaType.Generic,
  1: MediaType.Movie,
  2: MediaType.TvShow,
  3: MediaType.MusicTrack,
  4: MediaType.Photo,
};

export const MEDIA_NAMESPACE = 'urn:x-cast:com.google.cast.media';
