import { createLogger } from '@/shared/logging/logger';
import { bestEffortSync } from '@/shared/bestEffort';
import type { CastStatus } from '@/domain/cast/types';
import type { ProviderChannel, ProviderController, ProviderHost } from '@/ports/CastDevicePort';

export const YOUTUBE_APP_ID = '233637DE';
export const YOUTUBE_NAMESPACE = 'urn:x-cast:com.google.youtube.mdx';

/**
 * Plays YouTube videos by id through the YouTube receiver app. Videos added
 * with {@link addToQueue} are held here and flung one by one on `playNext`.
 */
export class YouTubeController implements ProviderController {
  public readonly appId = YOUTUBE_APP_ID;
  public readonly namespace = YOUTUBE_NAMESPACE;
  private readonly log = createLogger('Provider', 'YouTube');
  private host: ProviderHost | null = null;
  private channel: ProviderChannel | null = null;
  private screenId: string | null = null;
  private readonly queue: string[] = [];

  public bind(host: ProviderHost): void {
    this.host = host;
  }

  public get isActive(): boolean {
    return this.host?.getCastStatus()?.appId === this.appId;
  }

  public get queuedVideos(): readonly string[] {
    return this.queue;
  }

  public get currentScreenId(): string | null {
    return this.screenId;
  }

  public handleStatus(status: CastStatus | null): void {
    if (status?.appId === this.appId || !this.channel) {
      return;
    }
    this.log.debug('youtube app no longer active; dropping channel', { appId: status?.appId ?? null });
    this.closeChannel();
  }

  public async launch(): Promise<void> {
    const host = this.requireHost();
    this.log.info('launching youtube receiver');
    await host.launchApp(this.appId);
  }

  public async playVideo(videoId: string): Promise<void> {
    const channel = await this.ensureChannel();
    this.log.info('playing youtube video', { videoId });
    await channel.send({ type: 'flingVideo', data: { currentTime: 0, videoId } });
  }

  public addToQueue(videoId: string): void {
    this.queue.push(videoId);
    this.log.debug('queued youtube video', { videoId, queued: this.queue.length });
  }

  /**
   * Flings the next queued video. Returns false when the queue is empty.
   */
  public async playNext(): Promise<boolean> {
    const next = this.queue.shift();
    if (next === undefined) {
      return false;
    }
    await this.playVideo(next);
    return true;
  }

  private async ensureChannel(): Promise<ProviderChannel> {
    if (this.channel) {
      return this.channel;
    }
    const host = this.requireHost();
    const channel = await host.openChannel(this.appId, this.namespace);
    channel.onMessage((payload) => this.handleMessage(payload));
    this.channel = channel;
    await channel.send({ type: 'getMdxSessionStatus' });
    return channel;
  }

  private handleMessage(payload: Record<string, unknown>): void {
    if (payload.type !== 'mdxSessionStatus') {
      this.log.spam('youtube message', { type: payload.type });
      return;
    }
    const data = payload.data;
    if (typeof data === 'object' && data !== null && 'screenId' in data && typeof data.screenId === 'string') {
      this.screenId = data.screenId;
      this.log.debug('youtube screen id', { screenId: data.screenId });
    }
  }

  private closeChannel(): void {
    const channel = this.channel;
    this.channel = null;
    this.screenId = null;
    if (channel) {
      bestEffortSync(() => channel.close(), {
        fallback: undefined,
        onError: 'debug',
        log: this.log,
        label: 'youtube channel close failed',
      });
    }
  }

  private requireHost(): ProviderHost {
    if (!this.host) {
      throw new Error('youtube controller is not registered on a device');
    }
    return this.host;
  }
}
