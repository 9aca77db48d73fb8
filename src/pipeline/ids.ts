const YOUTUBE_HOSTS = new Set(['youtube.com', 'www.youtube.com', 'm.youtube.com', 'youtu.be']);

function parseUrl(input: string): URL | null {
  try {
    return new URL(input);
  } catch {
    return null;
  }
}

export function isYoutubeUrl(input: string): boolean {
  const url = parseUrl(input);
  return !!url && (url.protocol === 'http:' || url.protocol === 'https:') && YOUTUBE_HOSTS.has(url.hostname);
}

/** YouTube video ID from a watch or short URL; "video" when none can be found. */
export function extractYoutubeId(input: string): string {
  const url = parseUrl(input);
  if (!url) return 'video';
  if (url.hostname === 'youtu.be') {
    return url.pathname.replace(/^\/+/, '').split('/')[0] || 'video';
  }
  return url.searchParams.get('v') || 'video';
}
