import {
  Application,
  Client,
  DefaultMediaReceiver,
  JsonController,
  type ReceiverSession,
} from 'castv2-client';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { bestEffortSync, errorMessage } from '@/shared/bestEffort';
import {
  isPausedState,
  isPlayingState,
  mediaThumbnail,
} from '@/domain/cast/mediaStatus';
import { MEDIA_NAMESPACE, type CastStatus, type MediaStatus } from '@/domain/cast/types';
import type {
  CastDeviceHandle,
  CastMediaController,
  DisconnectListener,
  ProviderChannel,
  ProviderController,
  StatusListener,
} from '@/ports/CastDevicePort';
import type { ClockPort } from '@/ports/ClockPort';
import { fromCallback } from '@/adapters/cast/callbacks';
import { parseMediaStatus, parseReceiverStatus } from '@/adapters/cast/statusParser';

export const CAST_PORT = 8009;
const DEFAULT_CONTENT_TYPE = 'video/mp4';
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/**
 * The part of a castv2-client `Client` a connected device drives.
 */
export type CastClient = Pick<Client, 'getStatus' | 'getSessions' | 'join' | 'launch' | 'setVolume' | 'close'> & {
  receiver: Pick<Client['receiver'], 'launch' | 'stop'>;
  on(event: string, listener: (...args: unknown[]) => void): unknown;
};

export interface CastTarget {
  host: string;
  port: number;
  name: string | null;
  uuid: string | null;
}

const clampLevel = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Media-namespace commands against whatever media session the device has
 * joined. Commands without a session are logged and dropped.
 */
class CastV2MediaController implements CastMediaController {
  constructor(private readonly device: CastV2Device) {}

  public get status(): MediaStatus | null {
    return this.device.getMediaStatus();
  }

  public get title(): string | null {
    return this.status?.title ?? null;
  }

  public get thumbnail(): string | null {
    return mediaThumbnail(this.status);
  }

  public get isPlaying(): boolean {
    return isPlayingState(this.status);
  }

  public get isPaused(): boolean {
    return isPausedState(this.status);
  }

  public async play(): Promise<void> {
    const player = this.device.activePlayer('play');
    if (player) await fromCallback((cb) => player.play(cb));
  }

  public async pause(): Promise<void> {
    const player = this.device.activePlayer('pause');
    if (player) await fromCallback((cb) => player.pause(cb));
  }

  public async stop(): Promise<void> {
    const player = this.device.activePlayer('stop');
    if (player) await fromCallback((cb) => player.stop(cb));
  }

  public async seek(seconds: number): Promise<void> {
    const player = this.device.activePlayer('seek');
    if (player) await fromCallback((cb) => player.seek(seconds, cb));
  }

  public async queueNext(): Promise<void> {
    await this.jump(1);
  }

  public async queuePrev(): Promise<void> {
    await this.jump(-1);
  }

  public async playMedia(url: string, contentType: string | null): Promise<void> {
    await this.device.loadMedia(url, contentType ?? DEFAULT_CONTENT_TYPE);
  }

  private async jump(offset: number): Promise<void> {
    const player = this.device.activePlayer('queue jump');
    if (!player) return;
    await fromCallback((cb) => player.media.sessionRequest({ type: 'QUEUE_UPDATE', jump: offset }, cb));
  }
}

/**
 * A connected Cast receiver backed by a castv2-client `Client`. Receiver
 * status arrives on the platform connection; media status on the joined
 * default-receiver session, which is re-joined whenever the running app
 * changes.
 */
export class CastV2Device implements CastDeviceHandle {
  public readonly mediaController: CastMediaController;
  private readonly log: ComponentLogger;
  private castStatus: CastStatus | null = null;
  private mediaStatus: MediaStatus | null = null;
  private player: DefaultMediaReceiver | null = null;
  private joinedSessionId: string | null = null;
  private readonly listeners = new Set<StatusListener>();
  private readonly disconnectListeners = new Set<DisconnectListener>();
  private readonly controllers: ProviderController[] = [];
  private closed = false;
  private lost = false;

  constructor(
    private readonly client: CastClient,
    private readonly target: CastTarget,
    private readonly clock: ClockPort,
  ) {
    this.log = createLogger('Cast', target.name ?? target.host);
    this.mediaController = new CastV2MediaController(this);
    this.client.on('status', (raw: unknown) => this.handleReceiverStatus(raw));
    this.client.on('error', (error: unknown) => {
      this.log.warn('cast connection error', { message: errorMessage(error) });
      this.handleConnectionLost(errorMessage(error));
    });
    this.client.on('close', () => {
      if (!this.closed && !this.lost) this.log.warn('cast connection closed by device');
      this.handleConnectionLost(null);
    });
  }

  public get name(): string | null {
    return this.target.name;
  }

  public get uuid(): string | null {
    return this.target.uuid;
  }

  public get host(): string {
    return this.target.host;
  }

  public getCastStatus(): CastStatus | null {
    return this.castStatus;
  }

  public getMediaStatus(): MediaStatus | null {
    return this.mediaStatus;
  }

  public async refreshStatus(): Promise<void> {
    const raw = await fromCallback<unknown>((cb) => this.client.getStatus(cb));
    this.handleReceiverStatus(raw);
  }

  public async setVolume(level: number): Promise<void> {
    await fromCallback((cb) => this.client.setVolume({ level: clampLevel(level) }, cb));
  }

  public async volumeUp(delta: number): Promise<void> {
    await this.setVolume((this.castStatus?.volumeLevel ?? 0) + delta);
  }

  public async volumeDown(delta: number): Promise<void> {
    await this.setVolume((this.castStatus?.volumeLevel ?? 0) - delta);
  }

  public async setVolumeMuted(muted: boolean): Promise<void> {
    await fromCallback((cb) => this.client.setVolume({ muted }, cb));
  }

  public async quitApp(): Promise<void> {
    const sessionId = this.castStatus?.sessionId;
    if (!sessionId) {
      this.log.debug('quit skipped; no running app');
      return;
    }
    this.log.info('quitting app', { appId: this.castStatus?.appId ?? null });
    await fromCallback((cb) => this.client.receiver.stop(sessionId, cb));
  }

  public async launchApp(appId: string): Promise<void> {
    await fromCallback((cb) => this.client.receiver.launch(appId, cb));
    await this.refreshStatus();
  }

  public async openChannel(appId: string, namespace: string): Promise<ProviderChannel> {
    const sessions = await fromCallback<ReceiverSession[]>((cb) => this.client.getSessions(cb));
    const session = sessions.find((entry) => entry.appId === appId);
    if (!session) {
      throw new Error(`app ${appId} is not running`);
    }
    const app = await fromCallback<Application>((cb) => this.client.join(session, Application, cb));
    const controller = app.createController(JsonController, namespace);
    const log = this.log;
    return {
      send: async (payload) => {
        controller.send(payload);
      },
      onMessage: (listener) => {
        controller.on('message', (data: unknown) => {
          if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
            listener(Object.fromEntries(Object.entries(data)));
          }
        });
      },
      close: () => {
        bestEffortSync(
          () => {
            controller.close();
            app.close();
          },
          { fallback: undefined, onError: 'debug', log, label: 'channel close failed', context: { namespace } },
        );
      },
    };
  }

  public registerController(controller: ProviderController): void {
    controller.bind(this);
    this.controllers.push(controller);
  }

  public onStatus(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public onDisconnect(listener: DisconnectListener): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  public async disconnect(): Promise<void> {
    this.closed = true;
    this.listeners.clear();
    this.disconnectListeners.clear();
    this.dropPlayer();
    bestEffortSync(() => this.client.close(), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'cast client close failed',
    });
  }

  /** @internal */
  public activePlayer(command: string): DefaultMediaReceiver | null {
    if (!this.player || !this.mediaStatus) {
      this.log.debug(`${command} skipped; no media session`);
      return null;
    }
    return this.player;
  }

  /** @internal */
  public async loadMedia(url: string, contentType: string): Promise<void> {
    const player = await fromCallback<DefaultMediaReceiver>((cb) => this.client.launch(DefaultMediaReceiver, cb));
    this.attachPlayer(player);
    this.log.info('loading media', { url, contentType });
    const raw = await fromCallback<unknown>((cb) =>
      player.load({ contentId: url, contentType, streamType: 'BUFFERED' }, { autoplay: true }, cb),
    );
    this.handleMediaStatus(raw);
  }

  /**
   * Clears the cached status, tells status listeners once more so the bus
   * shows the device as stopped, then reports the loss. Later events from the
   * dead client are ignored.
   */
  private handleConnectionLost(reason: string | null): void {
    if (this.closed || this.lost) {
      return;
    }
    this.lost = true;
    this.castStatus = null;
    this.mediaStatus = null;
    this.dropPlayer();
    for (const controller of this.controllers) {
      controller.handleStatus(null);
    }
    this.notify();
    this.listeners.clear();
    const listeners = [...this.disconnectListeners];
    this.disconnectListeners.clear();
    for (const listener of listeners) {
      bestEffortSync(() => listener(reason), {
        fallback: undefined,
        onError: 'warn',
        log: this.log,
        label: 'disconnect listener failed',
      });
    }
    bestEffortSync(() => this.client.close(), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'cast client close failed',
    });
  }

  private handleReceiverStatus(raw: unknown): void {
    if (this.lost) {
      return;
    }
    const status = parseReceiverStatus(raw);
    if (!status) {
      this.log.spam('ignored receiver status', { raw });
      return;
    }
    const previousApp = this.castStatus?.appId ?? null;
    this.castStatus = status;
    this.log.spam('receiver status', { appId: status.appId, volume: status.volumeLevel });

    if (status.appId !== previousApp || status.sessionId !== this.joinedSessionId) {
      this.syncMediaSession(status);
    }
    for (const controller of this.controllers) {
      controller.handleStatus(status);
    }
    this.notify();
  }

  private syncMediaSession(status: CastStatus): void {
    const session = this.toSession(status);
    if (!session || !status.namespaces.includes(MEDIA_NAMESPACE)) {
      if (this.player) {
        this.dropPlayer();
        this.mediaStatus = null;
      }
      return;
    }
    if (session.sessionId === this.joinedSessionId) {
      return;
    }
    this.joinedSessionId = session.sessionId;
    this.client.join(session, DefaultMediaReceiver, (error, player) => {
      if (error) {
        this.log.debug('media session join failed', { message: error.message });
        this.joinedSessionId = null;
        return;
      }
      this.attachPlayer(player);
      player.getStatus((statusError, raw) => {
        if (statusError) {
          this.log.debug('media status request failed', { message: statusError.message });
          return;
        }
        this.handleMediaStatus(raw);
      });
    });
  }

  private attachPlayer(player: DefaultMediaReceiver): void {
    if (this.player !== player) {
      this.dropPlayer();
    }
    this.player = player;
    this.joinedSessionId = player.session.sessionId;
    player.on('status', (raw: unknown) => this.handleMediaStatus(raw));
    player.on('close', () => {
      if (this.player === player) {
        this.player = null;
        this.joinedSessionId = null;
      }
    });
  }

  private dropPlayer(): void {
    const player = this.player;
    this.player = null;
    this.joinedSessionId = null;
    if (!player) return;
    player.removeAllListeners('status');
    bestEffortSync(() => player.close(), {
      fallback: undefined,
      onError: 'debug',
      log: this.log,
      label: 'media session close failed',
    });
  }

  private handleMediaStatus(raw: unknown): void {
    if (this.lost) {
      return;
    }
    this.mediaStatus = parseMediaStatus(raw, this.clock.now(), this.mediaStatus);
    this.log.spam('media status', {
      state: this.mediaStatus?.playerState ?? null,
      title: this.mediaStatus?.title ?? null,
    });
    this.notify();
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      bestEffortSync(listener, {
        fallback: undefined,
        onError: 'warn',
        log: this.log,
        label: 'status listener failed',
      });
    }
  }

  private toSession(status: CastStatus): ReceiverSession | null {
    if (!status.appId || !status.sessionId || !status.transportId) {
      return null;
    }
    return {
      appId: status.appId,
      sessionId: status.sessionId,
      transportId: status.transportId,
      displayName: status.displayName ?? undefined,
      namespaces: status.namespaces.map((name) => ({ name })),
    };
  }
}

/**
 * Opens the platform connection and primes the receiver status.
 */
export async function connectCastDevice(
  target: CastTarget,
  clock: ClockPort,
  timeoutMs = DEFAULT_CONNECT_TIMEOUT_MS,
): Promise<CastV2Device> {
  const client = new Client();
  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      client.removeListener('error', onError);
      bestEffortSync(() => client.close(), { fallback: undefined });
      reject(new Error(`connection to ${target.host}:${target.port} timed out`));
    }, timeoutMs);
    const onError = (error: unknown): void => {
      clearTimeout(timer);
      bestEffortSync(() => client.close(), { fallback: undefined });
      reject(error instanceof Error ? error : new Error(String(error)));
    };
    client.once('error', onError);
    client.connect({ host: target.host, port: target.port }, () => {
      clearTimeout(timer);
      client.removeListener('error', onError);
      resolve();
    });
  });
  const device = new CastV2Device(client, target, clock);
  await device.refreshStatus();
  return device;
}
