import dotenv from "dotenv";
import { ConfigError } from "../utils/errors";
import { parsePlaylistReference } from "../utils/spotify";

dotenv.config();

export type AuthFlow = "authorization_code" | "client_credentials";

export interface SpotifyConfig {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
  authFlow: AuthFlow;
}

export interface LlmConfig {
  apiKey: string;
  model: string;
  apiUrl: string;
}

export interface AppConfig {
  spotify: SpotifyConfig;
  llm: LlmConfig;
  playlistId: string;
  verbose: boolean;
}

export const DEFAULT_LLM_MODEL = "nvidia/llama-3.1-nemotron-70b-instruct";
export const DEFAULT_LLM_API_URL = "https://integrate.api.nvidia.com/v1/chat/completions";

export interface ConfigOverrides {
  playlist?: string;
  authFlow?: AuthFlow;
  verbose?: boolean;
}

export function assertEnv(value: string | undefined, name: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ConfigError(`${name} environment variable is not set.`);
  }
  return trimmed;
}

export function parseAuthFlow(value: string | undefined): AuthFlow {
  const normalized = (value ?? "").trim().toLowerCase().replace(/-/g, "_");
  if (!normalized || normalized === "authorization_code" || normalized === "code") {
    return "authorization_code";
  }
  if (normalized === "client_credentials") {
    return "client_credentials";
  }
  throw new ConfigError(
    `Unknown Spotify auth flow "${value}". Use authorization_code or client_credentials.`
  );
}

function parseFlag(value: string | undefined): boolean {
  const v = (value ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes";
}

/**
 * Builds the configuration once at startup. Command-line overrides win over
 * the environment.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const authFlow = overrides.authFlow ?? parseAuthFlow(env.SPOTIFY_AUTH_FLOW);

  const spotify: SpotifyConfig = {
    clientId: assertEnv(env.SPOTIFY_CLIENT_ID, "SPOTIFY_CLIENT_ID"),
    clientSecret: assertEnv(env.SPOTIFY_CLIENT_SECRET, "SPOTIFY_CLIENT_SECRET"),
    authFlow,
  };
  if (authFlow === "authorization_code") {
    spotify.redirectUri = assertEnv(env.SPOTIFY_REDIRECT_URI, "SPOTIFY_REDIRECT_URI");
  }

  const llm: LlmConfig = {
    apiKey: assertEnv(env.LLM_API_KEY, "LLM_API_KEY"),
    model: env.LLM_MODEL?.trim() || DEFAULT_LLM_MODEL,
    apiUrl: env.LLM_API_URL?.trim() || DEFAULT_LLM_API_URL,
  };

  const playlistReference = overrides.playlist ?? assertEnv(env.PLAYLIST_ID, "PLAYLIST_ID");
  const playlistId = parsePlaylistReference(playlistReference);
  if (!playlistId) {
    throw new ConfigError(`"${playlistReference}" is not a Spotify playlist id, URI or URL.`);
  }

  return {
    spotify,
    llm,
    playlistId,
    verbose: overrides.verbose ?? parseFlag(env.VERBOSE),
  };
}
