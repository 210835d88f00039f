import type { CastStatus, MediaStatus } from '@/domain/cast/types';
import type { CastDeviceHandle, CastMediaController } from '@/ports/CastDevicePort';

/**
 * Read-through view over the device handle. Nothing is cached: every access
 * returns whatever the transport last received.
 */
export class StatusAccessor {
  constructor(private readonly device: CastDeviceHandle) {}

  public get castStatus(): CastStatus | null {
    return this.device.getCastStatus() ?? null;
  }

  public get mediaStatus(): MediaStatus | null {
    return this.mediaController.status ?? null;
  }

  public get mediaController(): CastMediaController {
    return this.device.mediaController;
  }

  public get appDisplayName(): string | null {
    return this.castStatus?.displayName || null;
  }
}
