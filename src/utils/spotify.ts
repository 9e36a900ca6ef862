const PLAYLIST_ID = /^[A-Za-z0-9]{16,}$/;
const PLAYLIST_URI_PREFIX = "spotify:playlist:";
const PLAYLIST_LINK = /^(https?:\/\/)?open\.spotify\.com\//i;

function playlistIdFromLink(link: string): string | undefined {
  let url: URL;
  try {
    url = new URL(/^https?:\/\//i.test(link) ? link : `https://${link}`);
  } catch (_error) {
    return undefined;
  }
  // Localised links carry a prefix segment, e.g. /intl-de/playlist/<id>.
  const segments = url.pathname.split("/").filter(Boolean);
  const at = segments.indexOf("playlist");
  return at === -1 ? undefined : segments[at + 1];
}

/**
 * Reads the playlist id out of one of the three forms Spotify hands out:
 * a bare id, a `spotify:playlist:<id>` URI, or an open.spotify.com link
 * (query string such as `?si=` ignored).
 */
export function parsePlaylistReference(reference: string): string | null {
  const value = reference.trim();

  let candidate: string | undefined = value;
  if (value.toLowerCase().startsWith(PLAYLIST_URI_PREFIX)) {
    candidate = value.slice(PLAYLIST_URI_PREFIX.length);
  } else if (PLAYLIST_LINK.test(value)) {
    candidate = playlistIdFromLink(value);
  }

  return candidate !== undefined && PLAYLIST_ID.test(candidate) ? candidate : null;
}

export function buildTrackSearchQuery(artist: string, trackName: string): string {
  return `artist:${artist} track:${trackName}`;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}
