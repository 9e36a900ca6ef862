import { SongSuggestion } from "../interfaces";
import { SongSuggestionResponseSchema } from "../schemas/llm-response-schemas";
import { decode } from "../schemas/validation";
import { ParseError, describeError } from "../utils/errors";
import { log } from "../utils/logger";

/**
 * Trims whitespace and any run of backticks at either end. A language tag
 * left over from a ```json fence is dropped too.
 */
export function cleanLlmResponse(raw: string): string {
  const text = raw.trim().replace(/^`+/, "").replace(/`+$/, "");
  return text.replace(/^json\s*/i, "").trim();
}

export function parseSongSuggestions(cleaned: string): SongSuggestion[] {
  let payload: unknown;
  try {
    payload = JSON.parse(cleaned);
  } catch (error) {
    const snippet = cleaned.slice(0, 200);
    log(`Failed to parse LLM response: ${snippet}${cleaned.length > 200 ? "..." : ""}`);
    throw new ParseError(describeError(error));
  }

  const decoded = decode(SongSuggestionResponseSchema, payload);
  if (!decoded.success) {
    throw new ParseError(decoded.message);
  }
  return decoded.data.songs;
}
