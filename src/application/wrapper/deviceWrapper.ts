import { createLogger } from '@/shared/logging/logger';
import { DEFAULT_NAME } from '@/config/environment';
import type { IconAssets } from '@/config/icons';
import { mediaType } from '@/domain/cast/mediaStatus';
import type { MediaType } from '@/domain/cast/types';
import type {
  CapabilityFlags,
  LoopStatus,
  Microseconds,
  MprisMetadata,
  PlaybackStatus,
  Titles,
} from '@/domain/mpris/types';
import type { CastDeviceHandle } from '@/ports/CastDevicePort';
import type { ClockPort } from '@/ports/ClockPort';
import type { DesktopEntryPort } from '@/ports/DesktopEntryPort';
import type { MprisAdapter } from '@/ports/MprisPort';
import { YouTubeController } from '@/application/providers/youtubeController';
import { resolveContentUrl } from '@/application/wrapper/contentId';
import { DurationTracker } from '@/application/wrapper/durationTracker';
import { IconResolver } from '@/application/wrapper/iconResolver';
import { composeMetadata } from '@/application/wrapper/metadata';
import { StatusAccessor } from '@/application/wrapper/statusAccessor';
import { getTitles } from '@/application/wrapper/titles';
import { TransportControls } from '@/application/wrapper/transportControls';

export interface DeviceWrapperOptions {
  clock: ClockPort;
  icons: IconAssets;
  desktopEntries: DesktopEntryPort;
  timeResolution?: number;
}

/**
 * One MPRIS adapter per connected device. Holds the device handle for the
 * lifetime of the session; a rediscovered device gets a new wrapper.
 */
export class DeviceWrapper implements MprisAdapter {
  private readonly log = createLogger('Wrapper');
  public readonly status: StatusAccessor;
  public readonly duration: DurationTracker;
  public readonly icons: IconResolver;
  public readonly youtube: YouTubeController;
  public readonly controls: TransportControls;

  constructor(
    public readonly device: CastDeviceHandle,
    options: DeviceWrapperOptions,
  ) {
    this.status = new StatusAccessor(device);
    this.duration = new DurationTracker(this.status, options.clock, options.timeResolution);
    this.icons = new IconResolver(this.status, options.icons, options.desktopEntries);
    this.youtube = new YouTubeController();
    this.controls = new TransportControls(device, this.status, this.youtube);

    device.registerController(this.youtube);
  }

  public get name(): string {
    return this.device.name || DEFAULT_NAME;
  }

  public toString(): string {
    return `<DeviceWrapper for ${this.name} (${this.device.host})>`;
  }

  public get titles(): Titles {
    return getTitles(this.status);
  }

  public metadata(): MprisMetadata {
    const metadata = composeMetadata({
      titles: this.titles,
      length: this.duration.getDuration(),
      artUrl: this.icons.getArtUrl(),
      url: this.getUrl(),
      trackNumber: this.status.mediaStatus?.trackNumber ?? null,
    });
    this.log.spam('metadata', { title: metadata['xesam:title'], length: metadata['mpris:length'] });
    return metadata;
  }

  public getUrl(): string | null {
    return resolveContentUrl(this.status.mediaStatus?.contentId ?? null, this.youtube.isActive);
  }

  public getMediaType(): MediaType | null {
    return mediaType(this.status.mediaStatus);
  }

  public onNewStatus(): void {
    this.duration.onNewStatus();
  }

  public getCurrentPosition(): Microseconds {
    return this.duration.getCurrentPosition();
  }

  public getDuration(): Microseconds | null {
    return this.duration.getDuration();
  }

  public getRate(): number {
    return this.duration.getRate();
  }

  public setRate(rate: number): void {
    this.controls.setRate(rate);
  }

  public getArtUrl(): string {
    return this.icons.getArtUrl();
  }

  public getDesktopEntry(): string {
    return this.icons.getDesktopEntry();
  }

  public setIcon(light: boolean): void {
    this.icons.setIcon(light);
  }

  public getPlaybackStatus(): PlaybackStatus {
    return this.controls.getPlaybackStatus();
  }

  public capabilities(): CapabilityFlags {
    return this.controls.capabilities();
  }

  public isPlaylist(): boolean {
    return this.controls.isPlaylist();
  }

  public isRepeating(): boolean {
    return this.controls.isRepeating();
  }

  public getVolume(): number | null {
    return this.controls.getVolume();
  }

  public setVolume(volume: number): Promise<void> {
    return this.controls.setVolume(volume);
  }

  public isMute(): boolean {
    return this.controls.isMute();
  }

  public setMute(muted: boolean): Promise<void> {
    return this.controls.setMute(muted);
  }

  public getShuffle(): boolean {
    return this.controls.getShuffle();
  }

  public setShuffle(shuffle: boolean): void {
    this.controls.setShuffle(shuffle);
  }

  public getLoopStatus(): LoopStatus {
    return this.controls.getLoopStatus();
  }

  public setLoopStatus(status: LoopStatus): void {
    this.controls.setLoopStatus(status);
  }

  public play(): Promise<void> {
    return this.controls.play();
  }

  public pause(): Promise<void> {
    return this.controls.pause();
  }

  public resume(): Promise<void> {
    return this.controls.resume();
  }

  public stop(): Promise<void> {
    return this.controls.stop();
  }

  public next(): Promise<void> {
    return this.controls.next();
  }

  public previous(): Promise<void> {
    return this.controls.previous();
  }

  public seek(position: Microseconds): Promise<void> {
    return this.controls.seek(position);
  }

  /** MPRIS SetPosition: an absolute seek within the current track. */
  public setPosition(position: Microseconds): Promise<void> {
    return this.controls.seek(position);
  }

  public quit(): Promise<void> {
    return this.controls.quit();
  }

  public openUri(uri: string): Promise<void> {
    return this.controls.openUri(uri);
  }

  public addTrack(uri: string, afterTrack: string | null, setAsCurrent: boolean): Promise<void> {
    return this.controls.addTrack(uri, afterTrack, setAsCurrent);
  }
}
