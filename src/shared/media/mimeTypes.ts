import path from 'node:path';

const MIME_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.aac': 'audio/aac',
  '.ogg': 'audio/ogg',
  '.oga': 'audio/ogg',
  '.opus': 'audio/opus',
  '.wav': 'audio/wav',
  '.flac': 'audio/flac',
  '.mp4': 'video/mp4',
  '.m4v': 'video/mp4',
  '.webm': 'video/webm',
  '.mkv': 'video/x-matroska',
  '.mov': 'video/quicktime',
  '.m3u8': 'application/x-mpegURL',
  '.mpd': 'application/dash+xml',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

function uriPath(uri: string): string {
  try {
    return new URL(uri).pathname;
  } catch {
    return uri.split(/[?#]/)[0];
  }
}

/**
 * Guesses a content type from the URI's extension; null when unknown.
 */
export function guessMimeType(uri: string): string | null {
  const ext = path.extname(uriPath(uri)).toLowerCase();
  return MIME_TYPES[ext] ?? null;
}

export function knownMimeTypes(): string[] {
  return [...new Set(Object.values(MIME_TYPES))];
}
