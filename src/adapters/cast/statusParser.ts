import type { CastStatus, MediaImage, MediaStatus, PlayerState } from '@/domain/cast/types';

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const str = (value: unknown): string | null =>
  typeof value === 'string' && value.length > 0 ? value : null;

const num = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const PLAYER_STATES: readonly PlayerState[] = ['PLAYING', 'PAUSED', 'BUFFERING', 'IDLE'];

const toPlayerState = (value: unknown): PlayerState =>
  PLAYER_STATES.find((state) => state === value) ?? 'UNKNOWN';

function parseImages(value: unknown): MediaImage[] {
  if (!Array.isArray(value)) return [];
  const images: MediaImage[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) continue;
    const url = str(entry.url);
    if (!url) continue;
    const image: MediaImage = { url };
    const width = num(entry.width);
    const height = num(entry.height);
    if (width !== null) image.width = width;
    if (height !== null) image.height = height;
    images.push(image);
  }
  return images;
}

/**
 * Receiver status as pushed on the receiver namespace: the first running
 * application plus the device volume.
 */
export function parseReceiverStatus(raw: unknown): CastStatus | null {
  if (!isRecord(raw)) return null;
  const status = isRecord(raw.status) ? raw.status : raw;
  const applications = Array.isArray(status.applications) ? status.applications : [];
  const app: JsonRecord = isRecord(applications[0]) ? applications[0] : {};
  const volume: JsonRecord = isRecord(status.volume) ? status.volume : {};
  const namespaces = Array.isArray(app.namespaces)
    ? app.namespaces.flatMap((entry) => {
        const name = isRecord(entry) ? str(entry.name) : null;
        return name ? [name] : [];
      })
    : [];

  return {
    appId: str(app.appId),
    displayName: str(app.displayName),
    iconUrl: str(app.iconUrl),
    statusText: str(app.statusText),
    sessionId: str(app.sessionId),
    transportId: str(app.transportId),
    namespaces,
    volumeLevel: num(volume.level) ?? 0,
    volumeMuted: volume.muted === true,
  };
}

/**
 * Media status as pushed on the media namespace. Receivers omit the `media`
 * block when only the player state changed, so those fields carry over from
 * `previous`. An array payload (the `status` field of a MEDIA_STATUS message)
 * is reduced to its first entry; an empty one means no media session.
 */
export function parseMediaStatus(
  raw: unknown,
  now: number,
  previous: MediaStatus | null = null,
): MediaStatus | null {
  const entry = Array.isArray(raw) ? raw[0] : raw;
  if (!isRecord(entry)) return null;

  const mediaSessionId = num(entry.mediaSessionId);
  const sameSession = previous !== null && previous.mediaSessionId === mediaSessionId;
  const media = isRecord(entry.media) ? entry.media : null;

  if (!media && !sameSession) {
    return {
      mediaSessionId,
      contentId: null,
      contentType: null,
      playerState: toPlayerState(entry.playerState),
      idleReason: str(entry.idleReason),
      currentTime: num(entry.currentTime),
      duration: null,
      playbackRate: num(entry.playbackRate) ?? 1,
      supportedMediaCommands: num(entry.supportedMediaCommands) ?? 0,
      metadataType: null,
      title: null,
      artist: null,
      albumName: null,
      trackNumber: null,
      images: [],
      metadata: {},
      lastUpdated: now,
    };
  }

  const base = previous ?? null;
  const metadata: JsonRecord | null = media && isRecord(media.metadata) ? media.metadata : null;

  return {
    mediaSessionId,
    contentId: media ? str(media.contentId) : base?.contentId ?? null,
    contentType: media ? str(media.contentType) : base?.contentType ?? null,
    playerState: toPlayerState(entry.playerState),
    idleReason: str(entry.idleReason),
    currentTime: num(entry.currentTime),
    duration: media ? num(media.duration) : base?.duration ?? null,
    playbackRate: num(entry.playbackRate) ?? 1,
    supportedMediaCommands: num(entry.supportedMediaCommands) ?? base?.supportedMediaCommands ?? 0,
    metadataType: metadata ? num(metadata.metadataType) : base?.metadataType ?? null,
    title: metadata ? str(metadata.title) : base?.title ?? null,
    artist: metadata ? str(metadata.artist) : base?.artist ?? null,
    albumName: metadata ? str(metadata.albumName) : base?.albumName ?? null,
    trackNumber: metadata ? num(metadata.trackNumber) : base?.trackNumber ?? null,
    images: metadata ? parseImages(metadata.images) : base?.images ?? [],
    metadata: metadata ?? base?.metadata ?? {},
    lastUpdated: now,
  };
}
