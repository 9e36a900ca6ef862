import { ChatCompletionRequest } from "../interfaces";
import { ChatCompletionResponseSchema } from "../schemas/llm-response-schemas";
import { decode } from "../schemas/validation";
import { LlmDecodeError, LlmHttpError, NoChoicesError } from "../utils/errors";
import { log } from "../utils/logger";
import { LlmTransport } from "./llmClient";

export function buildRecommendationPrompt(playlistText: string, count: number): string {
  return (
    `I will give you a playlist, give me ${count} songs that are similar to the songs in the playlist, ` +
    "no songs that you give me should be the same as the songs in the playlist. " +
    "Your goal is to give me songs that fit the vibe of the playlist. " +
    "You are only allowed to give me the songs nothing more. " +
    "The format of your answer will be a JSON object with the key 'songs' and the value being a list of song objects. " +
    "Each song object should have the keys 'name' and 'artist', " +
    `for example {"songs": [{"name": "...", "artist": "..."}]}. ` +
    `Here is the playlist: ${playlistText}`
  );
}

export function buildChatRequest(model: string, prompt: string): ChatCompletionRequest {
  return {
    model,
    messages: [{ role: "user", content: prompt }],
  };
}

/** Returns the first choice's content untouched. */
export async function askForRecommendations(
  llm: LlmTransport,
  playlistText: string,
  count: number
): Promise<string> {
  const request = buildChatRequest(llm.model, buildRecommendationPrompt(playlistText, count));

  log(`Sending request to LLM (${llm.model}) for ${count} songs`);
  const response = await llm.postChatCompletion(request);
  log(`Received LLM response with status ${response.status}`);

  if (response.status < 200 || response.status >= 300) {
    throw new LlmHttpError(response.status);
  }

  const decoded = decode(ChatCompletionResponseSchema, response.data);
  if (!decoded.success) {
    throw new LlmDecodeError(decoded.message);
  }

  const [choice] = decoded.data.choices;
  if (!choice) {
    throw new NoChoicesError();
  }
  return choice.message.content;
}
