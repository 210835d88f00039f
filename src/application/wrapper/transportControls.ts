import { createLogger } from '@/shared/logging/logger';
import { guessMimeType } from '@/shared/media/mimeTypes';
import {
  supportsPause,
  supportsQueueNext,
  supportsQueuePrev,
  supportsSeek,
} from '@/domain/cast/mediaStatus';
import {
  US_IN_SEC,
  type CapabilityFlags,
  type LoopStatus,
  type Microseconds,
  type PlaybackStatus,
} from '@/domain/mpris/types';
import type { CastDeviceHandle } from '@/ports/CastDevicePort';
import type { YouTubeController } from '@/application/providers/youtubeController';
import { getVideoId } from '@/application/wrapper/contentId';
import type { StatusAccessor } from '@/application/wrapper/statusAccessor';

const NO_DELTA = 0;

const clampVolume = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Transport commands and capability flags. Shuffle, loop and rate are not
 * concepts a Cast receiver has: setters accept the call and do nothing, so a
 * caller cannot read success from the absence of an error.
 */
export class TransportControls {
  private readonly log = createLogger('Wrapper', 'Transport');

  constructor(
    private readonly device: CastDeviceHandle,
    private readonly status: StatusAccessor,
    private readonly youtube: YouTubeController,
  ) {}

  public getPlaybackStatus(): PlaybackStatus {
    const controller = this.status.mediaController;
    if (controller.isPaused) {
      return 'Paused';
    }
    if (controller.isPlaying) {
      return 'Playing';
    }
    return 'Stopped';
  }

  public async play(): Promise<void> {
    await this.status.mediaController.play();
  }

  public async pause(): Promise<void> {
    await this.status.mediaController.pause();
  }

  public async resume(): Promise<void> {
    await this.play();
  }

  public async stop(): Promise<void> {
    await this.status.mediaController.stop();
  }

  public async next(): Promise<void> {
    if (this.youtube.isActive && (await this.youtube.playNext())) {
      return;
    }
    await this.status.mediaController.queueNext();
  }

  public async previous(): Promise<void> {
    await this.status.mediaController.queuePrev();
  }

  public async seek(position: Microseconds): Promise<void> {
    const seconds = Math.round(position / US_IN_SEC);
    await this.status.mediaController.seek(Math.max(0, seconds));
  }

  public async quit(): Promise<void> {
    await this.device.quitApp();
  }

  public getVolume(): number | null {
    const cast = this.status.castStatus;
    return cast ? cast.volumeLevel : null;
  }

  /**
   * Cast receivers are driven with relative steps here: the signed difference
   * from the current level becomes one up or down command. A zero difference
   * sends nothing.
   */
  public async setVolume(volume: number): Promise<void> {
    const current = this.getVolume();
    if (current === null) {
      this.log.debug('volume change skipped; no cast status', { volume });
      return;
    }
    const delta = clampVolume(volume) - current;

    if (delta > NO_DELTA) {
      await this.device.volumeUp(delta);
    } else if (delta < NO_DELTA) {
      await this.device.volumeDown(Math.abs(delta));
    }
  }

  public isMute(): boolean {
    return this.status.castStatus?.volumeMuted ?? false;
  }

  public async setMute(muted: boolean): Promise<void> {
    await this.device.setVolumeMuted(muted);
  }

  public getShuffle(): boolean {
    return false;
  }

  public setShuffle(shuffle: boolean): void {
    this.log.spam('shuffle is not supported', { shuffle });
  }

  public getLoopStatus(): LoopStatus {
    return 'None';
  }

  public setLoopStatus(status: LoopStatus): void {
    this.log.spam('loop status is not supported', { status });
  }

  public isRepeating(): boolean {
    return false;
  }

  public setRate(rate: number): void {
    this.log.spam('playback rate is not supported', { rate });
  }

  public isPlaylist(): boolean {
    const flags = this.capabilities();
    return flags.canGoNext || flags.canGoPrevious;
  }

  public capabilities(): CapabilityFlags {
    const media = this.status.mediaStatus;
    return {
      canQuit: true,
      canPlay: this.getPlaybackStatus() !== 'Playing',
      canPause: media ? supportsPause(media) : false,
      canSeek: media ? supportsSeek(media) : false,
      canGoNext: media ? supportsQueueNext(media) : false,
      canGoPrevious: media ? supportsQueuePrev(media) : false,
      canControl: true,
      canEditTracks: false,
    };
  }

  public async openUri(uri: string): Promise<void> {
    const videoId = getVideoId(uri);
    if (videoId) {
      await this.playYoutube(videoId);
      return;
    }
    const mimeType = guessMimeType(uri);
    this.log.info('opening uri', { uri, mimeType });
    await this.status.mediaController.playMedia(uri, mimeType);
  }

  /**
   * YouTube items always go to the YouTube controller's queue and are also
   * played at once when `setAsCurrent`. Other URIs are only played when
   * `setAsCurrent`: the default receiver has no queue to append to.
   */
  public async addTrack(uri: string, afterTrack: string | null, setAsCurrent: boolean): Promise<void> {
    const videoId = getVideoId(uri);
    this.log.debug('add track', { uri, afterTrack, setAsCurrent });

    if (videoId) {
      this.youtube.addToQueue(videoId);
      if (setAsCurrent) {
        await this.playYoutube(videoId);
      }
    } else if (setAsCurrent) {
      await this.openUri(uri);
    }
  }

  private async playYoutube(videoId: string): Promise<void> {
    if (!this.youtube.isActive) {
      await this.youtube.launch();
    }
    await this.youtube.playVideo(videoId);
  }
}
