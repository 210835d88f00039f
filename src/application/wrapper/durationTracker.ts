import { adjustedCurrentTime } from '@/domain/cast/mediaStatus';
import {
  BEGINNING,
  DEFAULT_RATE,
  NO_DURATION,
  US_IN_SEC,
  type Microseconds,
} from '@/domain/mpris/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { StatusAccessor } from '@/application/wrapper/statusAccessor';

/**
 * Track length and position in MPRIS microseconds.
 *
 * Some receivers (live streams, several third-party apps) never report a
 * duration. For those the tracker keeps a watermark of the furthest position
 * seen and reports it as the length.
 * The watermark only moves forward and is cleared by {@link onNewStatus} when
 * playback has no current time (stopped, or a new item loading).
 *
 * Status callbacks and MPRIS reads share the Node event loop, so a reset is
 * always visible to the next read.
 */
export class DurationTracker {
  private longestObserved: Microseconds | null = NO_DURATION;

  constructor(
    private readonly status: StatusAccessor,
    private readonly clock: ClockPort,
    private readonly resolution = 1,
  ) {}

  public get watermark(): Microseconds | null {
    return this.longestObserved;
  }

  public getDuration(): Microseconds | null {
    const duration = this.status.mediaStatus?.duration;
    if (duration) {
      return Math.round(duration * US_IN_SEC);
    }

    const current = this.getCurrentPosition();
    const longest = this.longestObserved;

    if (longest !== null && longest > current) {
      return longest;
    }
    if (current) {
      this.longestObserved = current;
      return current;
    }
    return NO_DURATION;
  }

  public getCurrentPosition(): Microseconds {
    const media = this.status.mediaStatus;
    if (!media) {
      return BEGINNING;
    }
    const positionSec = adjustedCurrentTime(media, this.clock.now());
    if (!positionSec) {
      return BEGINNING;
    }
    return Math.trunc(positionSec * US_IN_SEC);
  }

  public hasCurrentTime(): boolean {
    const currentTime = this.status.mediaStatus?.currentTime;
    if (!currentTime) {
      return false;
    }
    const factor = 10 ** this.resolution;
    return Math.round(currentTime * factor) / factor > BEGINNING;
  }

  public onNewStatus(): void {
    if (!this.hasCurrentTime()) {
      this.longestObserved = NO_DURATION;
    }
  }

  public getRate(): number {
    return this.status.mediaStatus?.playbackRate || DEFAULT_RATE;
  }
}
