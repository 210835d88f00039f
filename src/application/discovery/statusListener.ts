import type { CastDeviceHandle } from '@/ports/CastDevicePort';
import type { MprisAdapter, MprisServerPort } from '@/ports/MprisPort';

/**
 * Device status → adapter bookkeeping → MPRIS refresh. Returns the
 * unsubscribe function.
 */
export function registerStatusListener(
  device: CastDeviceHandle,
  server: MprisServerPort,
  adapter: MprisAdapter,
): () => void {
  return device.onStatus(() => {
    adapter.onNewStatus();
    server.refresh();
  });
}
