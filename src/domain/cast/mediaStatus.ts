import {
  MEDIA_COMMANDS,
  METADATA_TYPES,
  type MediaStatus,
  type MediaType,
} from '@/domain/cast/types';

/**
 * Current playback time extrapolated from the last snapshot: while playing,
 * the receiver only reports time on state changes.
 */
export function adjustedCurrentTime(status: MediaStatus, now: number): number | null {
  if (status.currentTime === null) {
    return null;
  }
  if (status.playerState !== 'PLAYING') {
    return status.currentTime;
  }
  const elapsedSec = Math.max(0, now - status.lastUpdated) / 1000;
  return status.currentTime + elapsedSec * status.playbackRate;
}

export function supportsCommand(status: MediaStatus, command: number): boolean {
  return (status.supportedMediaCommands & command) === command;
}

export const supportsPause = (status: MediaStatus): boolean =>
  supportsCommand(status, MEDIA_COMMANDS.PAUSE);

export const supportsSeek = (status: MediaStatus): boolean =>
  supportsCommand(status, MEDIA_COMMANDS.SEEK);

export const supportsQueueNext = (status: MediaStatus): boolean =>
  supportsCommand(status, MEDIA_COMMANDS.QUEUE_NEXT);

export const supportsQueuePrev = (status: MediaStatus): boolean =>
  supportsCommand(status, MEDIA_COMMANDS.QUEUE_PREV);

export function mediaThumbnail(status: MediaStatus | null): string | null {
  const first = status?.images.find((image) => image.url.length > 0);
  return first?.url ?? null;
}

export function mediaSubtitle(status: MediaStatus | null): string | null {
  const subtitle = status?.metadata.subtitle;
  return typeof subtitle === 'string' && subtitle.length > 0 ? subtitle : null;
}

export function mediaType(status: MediaStatus | null): MediaType | null {
  if (!status || status.metadataType === null) {
    return null;
  }
  return METADATA_TYPES[status.metadataType] ?? null;
}

export const isPlayingState = (status: MediaStatus | null): boolean =>
  status?.playerState === 'PLAYING' || status?.playerState === 'BUFFERING';

export const isPausedState = (status: MediaStatus | null): boolean =>
  status?.playerState === 'PAUSED';
