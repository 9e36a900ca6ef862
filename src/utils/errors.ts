export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export class AuthError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "AuthError";
  }
}

/** The request never produced an HTTP status (DNS failure, reset, timeout). */
export class TransportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "TransportError";
  }
}

export class HttpStatusError extends Error {
  constructor(readonly status: number, message = `Unexpected HTTP status ${status}`) {
    super(message);
    this.name = "HttpStatusError";
  }
}

export class NotFoundError extends Error {
  constructor(message = "Invalid Playlist ID") {
    super(message);
    this.name = "NotFoundError";
  }
}

export class NoMatchError extends Error {
  constructor(message = "No result found for the specified artist and track.") {
    super(message);
    this.name = "NoMatchError";
  }
}

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

export class LlmHttpError extends Error {
  constructor(readonly status: number) {
    super(`LLM request failed with HTTP status ${status}`);
    this.name = "LlmHttpError";
  }
}

export class LlmDecodeError extends Error {
  constructor(message: string) {
    super(`Failed to parse LLM response: ${message}`);
    this.name = "LlmDecodeError";
  }
}

export class NoChoicesError extends Error {
  constructor(message = "No response choices available") {
    super(message);
    this.name = "NoChoicesError";
  }
}

export class ParseError extends Error {
  constructor(message: string) {
    super(`Could not read song suggestions: ${message}`);
    this.name = "ParseError";
  }
}

/** Some chunks of an add-tracks batch were written before one failed. */
export class PartialAddError extends Error {
  constructor(readonly added: number, readonly total: number, cause: unknown) {
    super(`Added ${added} of ${total} songs before failing: ${describeError(cause)}`, { cause });
    this.name = "PartialAddError";
  }
}

/**
 * spotify-web-api-node rejects with a WebapiError carrying `statusCode`.
 * Anything without a numeric status never got an HTTP response.
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  ) {
    return error.statusCode;
  }
  return undefined;
}

function stringifyErrorBody(body: unknown): string {
  if (body === undefined || body === null) {
    return "undefined";
  }

  if (typeof body === "string") {
    return body;
  }

  try {
    return JSON.stringify(body);
  } catch (_error) {
    return String(body);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return stringifyErrorBody(error);
}

/** Detail line for diagnostic logs; includes the Spotify body when present. */
export function formatSpotifyError(error: unknown): string {
  const status = statusCodeOf(error);
  const body =
    typeof error === "object" && error !== null && "body" in error
      ? stringifyErrorBody(error.body)
      : "undefined";
  return `Spotify API Error: status=${status ?? "none"} message=${describeError(error)} body=${body}`;
}
