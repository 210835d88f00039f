/**
 * YouTube links are played through the YouTube receiver app by video id
 * instead of being loaded into the default media receiver.
 */

const YT_LONG = 'youtube.com/';
const YT_SHORT = 'youtu.be/';
const YOUTUBE_HOSTS = [YT_LONG, YT_SHORT] as const;

export const YT_VIDEO_URL = `https://${YT_LONG}watch?v=`;

export function isYoutube(uri: string): boolean {
  const lowered = uri.toLowerCase();
  return YOUTUBE_HOSTS.some((host) => lowered.includes(host));
}

export function getVideoId(uri: string): string | null {
  if (!isYoutube(uri)) {
    return null;
  }
  const lowered = uri.toLowerCase();
  let videoId: string | null = null;

  if (lowered.includes(YT_LONG)) {
    const marker = uri.indexOf('v=');
    videoId = marker >= 0 ? uri.slice(marker + 2) : null;
  } else if (lowered.includes(YT_SHORT)) {
    videoId = uri.slice(uri.lastIndexOf('/') + 1);
  }

  if (!videoId) {
    return null;
  }
  const [withoutQuery] = videoId.split('&');
  const [id] = withoutQuery.split(/[?#]/);
  return id || null;
}

/**
 * `xesam:url` for the current item. While the YouTube app is active the
 * receiver reports a bare video id, which is expanded to a watch URL.
 */
export function resolveContentUrl(contentId: string | null, youtubeActive: boolean): string | null {
  if (!contentId) {
    return null;
  }
  if (!contentId.includes('http') && youtubeActive) {
    return `${YT_VIDEO_URL}${contentId}`;
  }
  return contentId;
}
