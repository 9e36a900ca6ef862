import { Playlist, SongSuggestion } from "../interfaces";
import { PlaylistSchema, SearchTracksSchema } from "../schemas/spotify-schemas";
import { decode } from "../schemas/validation";
import {
  DecodeError,
  HttpStatusError,
  NoMatchError,
  NotFoundError,
  PartialAddError,
  TransportError,
  describeError,
  formatSpotifyError,
  statusCodeOf,
} from "../utils/errors";
import { log } from "../utils/logger";
import { buildTrackSearchQuery, chunk } from "../utils/spotify";
import { SpotifyGateway, SpotifyResponse } from "./spotifyClient";

/** Spotify rejects add-tracks requests with more items than this. */
export const MAX_TRACKS_PER_REQUEST = 100;

async function callSpotify(
  request: () => Promise<SpotifyResponse>,
  onNotFound: () => Error
): Promise<SpotifyResponse> {
  try {
    return await request();
  } catch (error) {
    log(formatSpotifyError(error));

    const status = statusCodeOf(error);
    if (status === undefined) {
      throw new TransportError(describeError(error), error);
    }
    if (status === 404) {
      throw onNotFound();
    }
    throw new HttpStatusError(status);
  }
}

export async function fetchPlaylist(api: SpotifyGateway, playlistId: string): Promise<Playlist> {
  log(`Fetching playlist ${playlistId}`);
  const response = await callSpotify(
    () => api.getPlaylist(playlistId),
    () => new NotFoundError("Invalid Playlist ID: The playlist could not be found.")
  );

  const decoded = decode(PlaylistSchema, response.body);
  if (!decoded.success) {
    throw new DecodeError(`Playlist response could not be decoded: ${decoded.message}`);
  }

  log(`Fetched ${decoded.data.tracks.items.length} playlist items`);
  return decoded.data;
}

/**
 * "<track> by <artist, artist>, " for every item, in playlist order. The
 * trailing separator is kept; it goes into the prompt as-is.
 */
export function renderPlaylistText(playlist: Playlist): string {
  let output = "";
  for (const item of playlist.tracks.items) {
    const { track } = item;
    if (!track) {
      continue;
    }
    const artistNames = track.artists.map((artist) => artist.name).join(", ");
    output += `${track.name} by ${artistNames}, `;
  }
  return output;
}

export async function searchTrack(
  api: SpotifyGateway,
  artist: string,
  trackName: string
): Promise<string> {
  const query = buildTrackSearchQuery(artist, trackName);
  const response = await callSpotify(
    () => api.searchTracks(query, { limit: 1 }),
    () => new NoMatchError("No results found for the specified artist and track.")
  );

  const decoded = decode(SearchTracksSchema, response.body);
  if (!decoded.success) {
    throw new DecodeError(`Search response could not be decoded: ${decoded.message}`);
  }

  const first = decoded.data.tracks.items[0];
  if (!first) {
    throw new NoMatchError();
  }
  return first.uri;
}

export interface ResolutionResult {
  uris: string[];
  unresolved: SongSuggestion[];
}

export async function resolveSuggestions(
  api: SpotifyGateway,
  suggestions: SongSuggestion[],
  onMiss: (song: SongSuggestion, error: unknown) => void
): Promise<ResolutionResult> {
  const uris: string[] = [];
  const unresolved: SongSuggestion[] = [];

  for (const song of suggestions) {
    try {
      const uri = await searchTrack(api, song.artist, song.name);
      log(`Matched "${song.name}" by ${song.artist} -> ${uri}`);
      uris.push(uri);
    } catch (error) {
      unresolved.push(song);
      onMiss(song, error);
    }
  }

  return { uris, unresolved };
}

export async function addTracks(
  api: SpotifyGateway,
  playlistId: string,
  uris: string[]
): Promise<number> {
  let added = 0;
  for (const slice of chunk(uris, MAX_TRACKS_PER_REQUEST)) {
    log(`Adding ${slice.length} tracks to playlist ${playlistId}`);
    try {
      await callSpotify(
        () => api.addTracksToPlaylist(playlistId, slice),
        () => new HttpStatusError(404)
      );
    } catch (error) {
      // Earlier chunks stay in the playlist; report how many made it.
      if (added > 0) {
        throw new PartialAddError(added, uris.length, error);
      }
      throw error;
    }
    added += slice.length;
  }
  return added;
}
