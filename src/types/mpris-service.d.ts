// mpris-service ships no type declarations and has no @types package.
declare module 'mpris-service' {
  import { EventEmitter } from 'node:events';

  namespace Player {
    interface Options {
      name: string;
      identity?: string;
      supportedUriSchemes?: string[];
      supportedMimeTypes?: string[];
      supportedInterfaces?: Array<'player' | 'trackList' | 'playlists'>;
      desktopEntry?: string;
    }

    interface PositionEvent {
      trackId: string;
      position: number;
    }

    interface OpenEvent {
      uri: string;
    }

    interface AddTrackEvent {
      uri: string;
      afterTrack: string;
      setAsCurrent: boolean;
    }
  }

  class Player extends EventEmitter {
    constructor(options: Player.Options);

    static PLAYBACK_STATUS_PLAYING: 'Playing';
    static PLAYBACK_STATUS_PAUSED: 'Paused';
    static PLAYBACK_STATUS_STOPPED: 'Stopped';
    static LOOP_STATUS_NONE: 'None';
    static LOOP_STATUS_TRACK: 'Track';
    static LOOP_STATUS_PLAYLIST: 'Playlist';

    identity: string;
    desktopEntry: string;
    metadata: Record<string, unknown>;
    playbackStatus: 'Playing' | 'Paused' | 'Stopped';
    loopStatus: 'None' | 'Track' | 'Playlist';
    shuffle: boolean;
    volume: number;
    rate: number;
    minimumRate: number;
    maximumRate: number;
    canQuit: boolean;
    canRaise: boolean;
    canPlay: boolean;
    canPause: boolean;
    canSeek: boolean;
    canGoNext: boolean;
    canGoPrevious: boolean;
    canControl: boolean;
    canEditTracks: boolean;
    hasTrackList: boolean;
    /** Polled by the bus for the Position property; microseconds. */
    getPosition: () => number;
    /** Emits the Seeked signal; microseconds. */
    seeked(position: number): void;
    objectPath(subpath?: string): string;
  }

  export = Player;
}
