import type { CastStatus, MediaStatus } from '@/domain/cast/types';

export type StatusListener = () => void;

export type DisconnectListener = (reason: string | null) => void;

/**
 * The receiver's media session. Getters re-read the latest snapshot.
 */
export interface CastMediaController {
  readonly status: MediaStatus | null;
  readonly title: string | null;
  readonly thumbnail: string | null;
  readonly isPlaying: boolean;
  readonly isPaused: boolean;
  play(): Promise<void>;
  pause(): Promise<void>;
  stop(): Promise<void>;
  seek(seconds: number): Promise<void>;
  queueNext(): Promise<void>;
  queuePrev(): Promise<void>;
  playMedia(url: string, contentType: string | null): Promise<void>;
}

/**
 * JSON message channel to one app namespace on the receiver.
 */
export interface ProviderChannel {
  send(payload: Record<string, unknown>): Promise<void>;
  onMessage(listener: (payload: Record<string, unknown>) => void): void;
  close(): void;
}

/**
 * What a provider controller may use from the device it is registered on.
 */
export interface ProviderHost {
  getCastStatus(): CastStatus | null;
  launchApp(appId: string): Promise<void>;
  openChannel(appId: string, namespace: string): Promise<ProviderChannel>;
}

/**
 * An app-specific casting controller (e.g. YouTube) registered on a device.
 */
export interface ProviderController {
  readonly appId: string;
  readonly namespace: string;
  bind(host: ProviderHost): void;
  /** Called by the device whenever the receiver status changes. */
  handleStatus(status: CastStatus | null): void;
}

export interface CastDeviceHandle extends ProviderHost {
  readonly name: string | null;
  readonly uuid: string | null;
  readonly host: string;
  readonly mediaController: CastMediaController;
  getMediaStatus(): MediaStatus | null;
  setVolume(level: number): Promise<void>;
  volumeUp(delta: number): Promise<void>;
  volumeDown(delta: number): Promise<void>;
  setVolumeMuted(muted: boolean): Promise<void>;
  quitApp(): Promise<void>;
  registerController(controller: ProviderController): void;
  onStatus(listener: StatusListener): () => void;
  /** Fires once when the connection drops without {@link disconnect}. */
  onDisconnect(listener: DisconnectListener): () => void;
  disconnect(): Promise<void>;
}

/**
 * Resolves identifiers to a connected device. Each call retries internally
 * with `retryWait` seconds between connection attempts and yields null when
 * its own budget is spent.
 */
export interface CastTransportPort {
  findByHost(host: string, retryWait: number | null): Promise<CastDeviceHandle | null>;
  findByUuid(uuid: string, retryWait: number | null): Promise<CastDeviceHandle | null>;
  findByName(name: string, retryWait: number | null): Promise<CastDeviceHandle | null>;
  findAny(retryWait: number | null): Promise<CastDeviceHandle | null>;
}
