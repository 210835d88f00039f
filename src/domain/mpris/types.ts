/**
 * MPRIS2 vocabulary (org.mpris.MediaPlayer2.Player) used by the wrapper.
 * Times are microseconds throughout.
 */

export type Microseconds = number;

export type PlaybackStatus = 'Playing' | 'Paused' | 'Stopped';

export type LoopStatus = 'None' | 'Track' | 'Playlist';

export const US_IN_SEC = 1_000_000;

/** No duration known; the `mpris:length` key is left out. */
export const NO_DURATION = null;

export const BEGINNING: Microseconds = 0;
export const DEFAULT_RATE = 1;
export const DEFAULT_DISC_NO = 1;
export const MAX_TITLES = 3;
export const NO_TRACK = '/org/mpris/MediaPlayer2/TrackList/NoTrack';
export const NO_DESKTOP_FILE = '';

export interface Titles {
  title: string | null;
  artist: string | null;
  album: string | null;
}

export interface MprisMetadata {
  'mpris:trackid': string;
  'mpris:length': Microseconds | typeof NO_DURATION;
  'mpris:artUrl': string;
  'xesam:url': string | null;
  'xesam:title': string | null;
  'xesam:artist': string[];
  'xesam:album': string | null;
  'xesam:albumArtist': string[];
  'xesam:discNumber': number;
  'xesam:trackNumber': number | null;
  'xesam:comment': string[];
}

export interface CapabilityFlags {
  canQuit: boolean;
  canPlay: boolean;
  canPause: boolean;
  canSeek: boolean;
  canGoNext: boolean;
  canGoPrevious: boolean;
  canControl: boolean;
  canEditTracks: boolean;
}
