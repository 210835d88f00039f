import type {
  CapabilityFlags,
  LoopStatus,
  Microseconds,
  MprisMetadata,
  PlaybackStatus,
} from '@/domain/mpris/types';

/**
 * The single data source an MPRIS server consults. Reads are synchronous
 * projections of the latest device status; commands go to the device.
 */
export interface MprisAdapter {
  readonly name: string;
  metadata(): MprisMetadata;
  getPlaybackStatus(): PlaybackStatus;
  getCurrentPosition(): Microseconds;
  getRate(): number;
  setRate(rate: number): void;
  getVolume(): number | null;
  setVolume(volume: number): Promise<void>;
  isMute(): boolean;
  setMute(muted: boolean): Promise<void>;
  getShuffle(): boolean;
  setShuffle(shuffle: boolean): void;
  getLoopStatus(): LoopStatus;
  setLoopStatus(status: LoopStatus): void;
  isPlaylist(): boolean;
  capabilities(): CapabilityFlags;
  getDesktopEntry(): string;
  setIcon(light: boolean): void;
  play(): Promise<void>;
  pause(): Promise<void>;
  resume(): Promise<void>;
  stop(): Promise<void>;
  next(): Promise<void>;
  previous(): Promise<void>;
  seek(position: Microseconds): Promise<void>;
  setPosition(position: Microseconds): Promise<void>;
  quit(): Promise<void>;
  openUri(uri: string): Promise<void>;
  addTrack(uri: string, afterTrack: string | null, setAsCurrent: boolean): Promise<void>;
  onNewStatus(): void;
}

export interface MprisServerPort {
  readonly adapter: MprisAdapter;
  /** Claims the bus name and announces the player. */
  publish(): void;
  /** Pushes the adapter's current state to the bus. */
  refresh(): void;
  /** Settles once the server is closed. */
  loop(): Promise<void>;
  close(): Promise<void>;
}

export type MprisServerFactory = (name: string, adapter: MprisAdapter) => MprisServerPort;
