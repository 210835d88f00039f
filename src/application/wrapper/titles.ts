import { mediaSubtitle } from '@/domain/cast/mediaStatus';
import { MAX_TITLES, type Titles } from '@/domain/mpris/types';
import type { StatusAccessor } from '@/application/wrapper/statusAccessor';

/**
 * Up to three display strings, most specific first: track title, subtitle,
 * artist, album, then the receiver app's name. Absent sources are skipped so
 * later entries move up rather than leaving gaps.
 */
export function getTitles(status: StatusAccessor): Titles {
  const media = status.mediaStatus;
  const candidates = [
    status.mediaController.title,
    mediaSubtitle(media),
    media?.artist,
    media?.albumName,
    status.appDisplayName,
  ];
  const titles = candidates
    .filter((value): value is string => typeof value === 'string' && value.length > 0)
    .slice(0, MAX_TITLES);

  const [title = null, artist = null, album = null] = titles;
  return { title, artist, album };
}
