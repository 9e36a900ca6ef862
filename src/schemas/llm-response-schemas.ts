/**
 * Zod schemas for the chat-completion envelope and the song list the model
 * is asked to return inside it.
 */

import { z } from "zod";
import { ChatCompletionResponse, SongSuggestion } from "../interfaces";

export const ChatCompletionResponseSchema: z.ZodType<ChatCompletionResponse> = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string(),
      }),
    })
  ),
});

export const SongSuggestionSchema: z.ZodType<SongSuggestion> = z.object({
  name: z.string(),
  artist: z.string(),
});

export const SongSuggestionResponseSchema = z.object({
  songs: z.array(SongSuggestionSchema),
});
