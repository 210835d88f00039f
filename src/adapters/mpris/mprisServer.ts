import Player from 'mpris-service';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { knownMimeTypes } from '@/shared/media/mimeTypes';
import { APP_NAME } from '@/config/environment';
import { getPlayerBusName } from '@/domain/mpris/dbusNames';
import type { LoopStatus, Microseconds, MprisMetadata } from '@/domain/mpris/types';
import type { MprisAdapter, MprisServerPort } from '@/ports/MprisPort';

const URI_SCHEMES = ['http', 'https'];
const LOOP_STATUSES: readonly LoopStatus[] = ['None', 'Track', 'Playlist'];

/**
 * The subset of an mpris-service player this server drives.
 */
export type MprisPlayer = Pick<
  Player,
  | 'metadata'
  | 'playbackStatus'
  | 'loopStatus'
  | 'shuffle'
  | 'volume'
  | 'rate'
  | 'canQuit'
  | 'canPlay'
  | 'canPause'
  | 'canSeek'
  | 'canGoNext'
  | 'canGoPrevious'
  | 'canControl'
  | 'canEditTracks'
  | 'desktopEntry'
  | 'getPosition'
  | 'seeked'
> & {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  removeAllListeners(): unknown;
};

export type MprisPlayerFactory = (options: Player.Options) => MprisPlayer;

export const createMprisServicePlayer: MprisPlayerFactory = (options) => new Player(options);

const INTEGER_KEYS: readonly string[] = ['mpris:length', 'xesam:discNumber', 'xesam:trackNumber'];

/**
 * Drops absent keys; the bus has no null variant. Integer-typed keys holding
 * a fractional value are dropped too, since mpris-service marshals them as
 * D-Bus integers.
 */
export function toPlayerMetadata(metadata: MprisMetadata): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(metadata).filter(([key, value]) => {
      if (value === null) return false;
      return !INTEGER_KEYS.includes(key) || Number.isInteger(value);
    }),
  );
}

export function busNameFor(deviceName: string): string {
  return `${APP_NAME}.${getPlayerBusName(deviceName)}`;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Publishes one {@link MprisAdapter} as `org.mpris.MediaPlayer2.<bus name>`.
 * Bus method calls become adapter commands; state flows the other way on
 * every {@link refresh}.
 */
export class MprisServer implements MprisServerPort {
  private readonly log: ComponentLogger;
  private player: MprisPlayer | null = null;
  private closed = false;
  private release: (() => void) | null = null;
  private readonly done: Promise<void>;

  constructor(
    public readonly name: string,
    public readonly adapter: MprisAdapter,
    private readonly createPlayer: MprisPlayerFactory = createMprisServicePlayer,
  ) {
    this.log = createLogger('Mpris', name);
    this.done = new Promise<void>((resolve) => {
      this.release = resolve;
    });
  }

  public get busName(): string {
    return busNameFor(this.name);
  }

  public get published(): MprisPlayer | null {
    return this.player;
  }

  public publish(): void {
    if (this.player || this.closed) {
      return;
    }
    const player = this.createPlayer({
      name: this.busName,
      identity: this.adapter.name,
      supportedUriSchemes: URI_SCHEMES,
      supportedMimeTypes: knownMimeTypes(),
      supportedInterfaces: ['player', 'trackList'],
      desktopEntry: this.adapter.getDesktopEntry(),
    });
    player.getPosition = () => this.adapter.getCurrentPosition();
    this.player = player;
    this.wire(player);
    this.log.info('mpris player published', { busName: `org.mpris.MediaPlayer2.${this.busName}` });
    this.refresh();
  }

  public refresh(): void {
    const player = this.player;
    if (!player) {
      return;
    }
    const adapter = this.adapter;
    const flags = adapter.capabilities();
    player.metadata = toPlayerMetadata(adapter.metadata());
    player.playbackStatus = adapter.getPlaybackStatus();
    player.volume = adapter.getVolume() ?? 0;
    player.rate = adapter.getRate();
    player.shuffle = adapter.getShuffle();
    player.loopStatus = adapter.getLoopStatus();
    player.canQuit = flags.canQuit;
    player.canPlay = flags.canPlay;
    player.canPause = flags.canPause;
    player.canSeek = flags.canSeek;
    player.canGoNext = flags.canGoNext;
    player.canGoPrevious = flags.canGoPrevious;
    player.canControl = flags.canControl;
    player.canEditTracks = flags.canEditTracks;
    player.desktopEntry = adapter.getDesktopEntry();
    this.log.spam('mpris state refreshed', { status: player.playbackStatus });
  }

  public loop(): Promise<void> {
    return this.done;
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.player?.removeAllListeners();
    this.player = null;
    this.log.info('mpris player closed');
    this.release?.();
  }

  private wire(player: MprisPlayer): void {
    const adapter = this.adapter;
    player.on('play', () => this.dispatch('play', () => adapter.play()));
    player.on('pause', () => this.dispatch('pause', () => adapter.pause()));
    player.on('playpause', () =>
      this.dispatch('playpause', () => (adapter.getPlaybackStatus() === 'Playing' ? adapter.pause() : adapter.play())),
    );
    player.on('stop', () => this.dispatch('stop', () => adapter.stop()));
    player.on('next', () => this.dispatch('next', () => adapter.next()));
    player.on('previous', () => this.dispatch('previous', () => adapter.previous()));
    player.on('quit', () => this.dispatch('quit', () => adapter.quit()));
    player.on('seek', (offset: unknown) => {
      if (typeof offset !== 'number') return;
      const target = Math.max(0, adapter.getCurrentPosition() + offset);
      this.dispatch('seek', () => this.seekTo(player, target));
    });
    player.on('position', (event: unknown) => {
      if (!isRecord(event) || typeof event.position !== 'number') return;
      const position = event.position;
      this.dispatch('position', () => this.seekTo(player, position));
    });
    player.on('volume', (volume: unknown) => {
      if (typeof volume !== 'number') return;
      this.dispatch('volume', () => adapter.setVolume(volume));
    });
    player.on('open', (event: unknown) => {
      if (!isRecord(event) || typeof event.uri !== 'string') return;
      const uri = event.uri;
      this.dispatch('open', () => adapter.openUri(uri));
    });
    player.on('addTrack', (event: unknown) => {
      if (!isRecord(event) || typeof event.uri !== 'string') return;
      const uri = event.uri;
      const afterTrack = typeof event.afterTrack === 'string' ? event.afterTrack : null;
      const setAsCurrent = event.setAsCurrent === true;
      this.dispatch('addTrack', () => adapter.addTrack(uri, afterTrack, setAsCurrent));
    });
    player.on('shuffle', (shuffle: unknown) => {
      if (typeof shuffle !== 'boolean') return;
      this.dispatch('shuffle', async () => adapter.setShuffle(shuffle));
    });
    player.on('loopStatus', (status: unknown) => {
      const loop = LOOP_STATUSES.find((entry) => entry === status);
      if (!loop) return;
      this.dispatch('loopStatus', async () => adapter.setLoopStatus(loop));
    });
    player.on('rate', (rate: unknown) => {
      if (typeof rate !== 'number') return;
      this.dispatch('rate', async () => adapter.setRate(rate));
    });
  }

  private async seekTo(player: MprisPlayer, position: Microseconds): Promise<void> {
    await this.adapter.setPosition(position);
    player.seeked(position);
  }

  /**
   * Runs one bus-initiated command and republishes state afterwards. A failed
   * command is logged; the bus call itself has already returned.
   */
  private dispatch(command: string, run: () => Promise<void>): void {
    this.log.debug('mpris command', { command });
    void run()
      .then(() => this.refresh())
      .catch((error: unknown) => {
        this.log.warn('mpris command failed', { command, message: errorMessage(error) });
      });
  }
}
