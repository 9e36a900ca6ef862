import axios from "axios";
import { LlmConfig } from "../config/env";
import { ChatCompletionRequest } from "../interfaces";
import { TransportError, describeError } from "../utils/errors";

export interface LlmHttpResponse {
  status: number;
  data: unknown;
}

export interface LlmTransport {
  readonly model: string;
  postChatCompletion(request: ChatCompletionRequest): Promise<LlmHttpResponse>;
}

/**
 * Every HTTP status resolves; the caller decides what counts as failure.
 * Only requests that never got a response reject, as `TransportError`.
 */
export function createLlmClient(config: LlmConfig): LlmTransport {
  const http = axios.create({
    headers: {
      Authorization: `Bearer ${config.apiKey}`,
      "Content-Type": "application/json",
    },
    validateStatus: () => true,
  });

  return {
    model: config.model,
    async postChatCompletion(request) {
      try {
        const response = await http.post<unknown>(config.apiUrl, request);
        return { status: response.status, data: response.data };
      } catch (error) {
        throw new TransportError(`LLM request failed: ${describeError(error)}`, error);
      }
    },
  };
}
