import SpotifyWebApi from "spotify-web-api-node";
import { AuthFlow, SpotifyConfig } from "../config/env";
import { TokenResponseSchema } from "../schemas/spotify-schemas";
import { decode } from "../schemas/validation";
import { Prompter, Reporter } from "../cli/console";
import { AuthError, ConfigError, describeError, formatSpotifyError } from "../utils/errors";
import { log } from "../utils/logger";
import { SpotifyAuthGateway, SpotifyResponse } from "./spotifyClient";

export const SPOTIFY_SCOPES = ["playlist-modify-public", "playlist-modify-private"];

const OAUTH_STATE = "playlist-recommender-auth";

export interface AuthStrategy {
  readonly flow: AuthFlow;
  obtainAccessToken(): Promise<string>;
}

export function buildAuthorizationUrl(clientId: string, redirectUri: string): string {
  const api = new SpotifyWebApi({ clientId, redirectUri });
  return api.createAuthorizeURL(SPOTIFY_SCOPES, OAUTH_STATE);
}

async function exchangeToken(
  label: string,
  request: () => Promise<SpotifyResponse>
): Promise<string> {
  let response: SpotifyResponse;
  try {
    log(`Requesting Spotify access token (${label})`);
    response = await request();
  } catch (error) {
    log(`Token exchange failed: ${formatSpotifyError(error)}`);
    throw new AuthError(`Spotify token exchange failed: ${describeError(error)}`, error);
  }

  const decoded = decode(TokenResponseSchema, response.body);
  if (!decoded.success) {
    throw new AuthError(`Spotify token response could not be decoded: ${decoded.message}`);
  }

  log(`Spotify token exchange successful (${label})`);
  return decoded.data.access_token;
}

export function authorizeCodeFlow(api: SpotifyAuthGateway, code: string): Promise<string> {
  return exchangeToken("authorization_code", () => api.authorizationCodeGrant(code));
}

export function clientCredentialsFlow(api: SpotifyAuthGateway): Promise<string> {
  return exchangeToken("client_credentials", () => api.clientCredentialsGrant());
}

export class AuthorizationCodeStrategy implements AuthStrategy {
  readonly flow = "authorization_code" as const;

  constructor(
    private readonly api: SpotifyAuthGateway,
    private readonly config: SpotifyConfig,
    private readonly prompter: Prompter,
    private readonly reporter: Reporter,
    private readonly presetCode?: string
  ) {}

  async obtainAccessToken(): Promise<string> {
    const { redirectUri } = this.config;
    if (!redirectUri) {
      throw new ConfigError("SPOTIFY_REDIRECT_URI environment variable is not set.");
    }

    let code = this.presetCode?.trim();
    if (!code) {
      const authorizeUrl = buildAuthorizationUrl(this.config.clientId, redirectUri);
      this.reporter.info(`Go to this URL to authorize: ${authorizeUrl}`);
      code = (await this.prompter.ask("Enter the authorization code:")).trim();
    }

    return authorizeCodeFlow(this.api, code);
  }
}

export class ClientCredentialsStrategy implements AuthStrategy {
  readonly flow = "client_credentials" as const;

  constructor(private readonly api: SpotifyAuthGateway) {}

  obtainAccessToken(): Promise<string> {
    return clientCredentialsFlow(this.api);
  }
}

export function createAuthStrategy(
  config: SpotifyConfig,
  api: SpotifyAuthGateway,
  prompter: Prompter,
  reporter: Reporter,
  presetCode?: string
): AuthStrategy {
  if (config.authFlow === "client_credentials") {
    return new ClientCredentialsStrategy(api);
  }
  return new AuthorizationCodeStrategy(api, config, prompter, reporter, presetCode);
}
