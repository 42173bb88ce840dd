import { isValidVideoId } from '@streamvault/shared';

/**
 * Pulls the video id out of a watch, short-link, live or shorts URL, or
 * returns a bare id unchanged.
 */
export function extractVideoId(urlOrId: string): string | null {
  const input = urlOrId.trim();
  if (input.length === 11 && isValidVideoId(input)) {
    return input;
  }

  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return null;
  }

  const labels = url.hostname.toLowerCase().split('.');
  if (url.hostname === 'youtu.be') {
    const id = url.pathname.slice(1).split('/')[0];
    return id || null;
  }
  if (!labels.includes('youtube')) {
    return null;
  }

  const pathMatch = /^\/(?:shorts|live)\/([^/?#]+)/.exec(url.pathname);
  if (pathMatch) {
    return pathMatch[1];
  }
  if (url.pathname === '/watch') {
    return url.searchParams.get('v');
  }
  return null;
}
