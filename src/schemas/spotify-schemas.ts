/**
 * Zod schemas for the Spotify Web API bodies this tool reads.
 *
 * Only the fields the pipeline uses are declared; everything else in the
 * responses is stripped.
 */

import { z } from "zod";
import { Playlist, TokenResponse, Track } from "../interfaces";

export const ArtistSchema = z.object({
  name: z.string(),
});

export const TrackSchema: z.ZodType<Track> = z.object({
  name: z.string(),
  artists: z.array(ArtistSchema),
  uri: z.string().optional(),
});

export const PlaylistSchema: z.ZodType<Playlist> = z.object({
  tracks: z.object({
    items: z.array(
      z.object({
        track: TrackSchema.nullable(),
      })
    ),
  }),
});

export const SearchTracksSchema = z.object({
  tracks: z.object({
    items: z.array(z.object({ uri: z.string() })),
  }),
});

export const TokenResponseSchema: z.ZodType<TokenResponse> = z.object({
  access_token: z.string().min(1),
});
