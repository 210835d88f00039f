import { getTrackId } from '@/domain/mpris/dbusNames';
import {
  DEFAULT_DISC_NO,
  type Microseconds,
  type MprisMetadata,
  type Titles,
} from '@/domain/mpris/types';

export interface MetadataSources {
  titles: Titles;
  length: Microseconds | null;
  artUrl: string;
  url: string | null;
  trackNumber: number | null;
}

/**
 * Fills the fixed MPRIS metadata vocabulary. The second title doubles as
 * both artist and album artist.
 */
export function composeMetadata(sources: MetadataSources): MprisMetadata {
  const { title, artist, album } = sources.titles;
  const artists = artist ? [artist] : [];

  return {
    'mpris:trackid': getTrackId(title),
    'mpris:length': sources.length,
    'mpris:artUrl': sources.artUrl,
    'xesam:url': sources.url,
    'xesam:title': title,
    'xesam:artist': artists,
    'xesam:album': album,
    'xesam:albumArtist': artists,
    'xesam:discNumber': DEFAULT_DISC_NO,
    'xesam:trackNumber': sources.trackNumber,
    'xesam:comment': [],
  };
}
