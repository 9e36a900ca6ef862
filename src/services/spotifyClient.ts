import SpotifyWebApi from "spotify-web-api-node";
import { SpotifyConfig } from "../config/env";

export interface SpotifyResponse {
  body: unknown;
  statusCode: number;
}

/**
 * The slice of spotify-web-api-node the pipeline calls. Bodies are left as
 * `unknown` and decoded by the services.
 */
export interface SpotifyGateway {
  getPlaylist(playlistId: string): Promise<SpotifyResponse>;
  searchTracks(query: string, options: { limit: number }): Promise<SpotifyResponse>;
  addTracksToPlaylist(playlistId: string, uris: string[]): Promise<SpotifyResponse>;
}

export interface SpotifyAuthGateway {
  authorizationCodeGrant(code: string): Promise<SpotifyResponse>;
  clientCredentialsGrant(): Promise<SpotifyResponse>;
}

function createSpotifyApi(config: SpotifyConfig): SpotifyWebApi {
  return new SpotifyWebApi({
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    redirectUri: config.redirectUri,
  });
}

export function createSpotifyAuthGateway(config: SpotifyConfig): SpotifyAuthGateway {
  const api = createSpotifyApi(config);
  return {
    authorizationCodeGrant: (code) => api.authorizationCodeGrant(code),
    clientCredentialsGrant: () => api.clientCredentialsGrant(),
  };
}

// One client per access token; the token is never refreshed.
export function createUserSpotifyApi(config: SpotifyConfig, accessToken: string): SpotifyGateway {
  const api = createSpotifyApi(config);
  api.setAccessToken(accessToken);

  return {
    getPlaylist: (playlistId) => api.getPlaylist(playlistId),
    searchTracks: (query, options) => api.searchTracks(query, options),
    addTracksToPlaylist: (playlistId, uris) => api.addTracksToPlaylist(playlistId, uris),
  };
}
