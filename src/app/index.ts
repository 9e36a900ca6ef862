import { AppConfig } from "../config/env";
import { Prompter, Reporter } from "../cli/console";
import { parseSongCount } from "../cli/parseCliArgs";
import { RunOptions, RunResult, SongSuggestion } from "../interfaces";
import { LlmTransport, createLlmClient } from "../services/llmClient";
import {
  addTracks,
  fetchPlaylist,
  renderPlaylistText,
  resolveSuggestions,
} from "../services/playlistService";
import { askForRecommendations } from "../services/recommendationService";
import { cleanLlmResponse, parseSongSuggestions } from "../services/responseParser";
import {
  AuthStrategy,
  createAuthStrategy,
} from "../services/spotifyAuthService";
import {
  SpotifyGateway,
  createSpotifyAuthGateway,
  createUserSpotifyApi,
} from "../services/spotifyClient";
import { PartialAddError, describeError } from "../utils/errors";
import { log } from "../utils/logger";

export interface WorkflowDeps {
  config: AppConfig;
  options: RunOptions;
  prompter: Prompter;
  reporter: Reporter;
  authStrategy?: AuthStrategy;
  createSpotifyApi?: (accessToken: string) => SpotifyGateway;
  llm?: LlmTransport;
}

async function resolveCount(options: RunOptions, prompter: Prompter): Promise<number> {
  if (options.count !== undefined) {
    return options.count;
  }
  const answer = await prompter.ask("Enter the number of songs you want to add to the playlist:");
  return parseSongCount(answer);
}

async function readPlaylistText(
  api: SpotifyGateway,
  playlistId: string,
  reporter: Reporter
): Promise<string> {
  try {
    const playlist = await fetchPlaylist(api, playlistId);
    return renderPlaylistText(playlist);
  } catch (error) {
    reporter.error(describeError(error));
    return "";
  }
}

async function requestSuggestions(
  llm: LlmTransport,
  playlistText: string,
  count: number,
  reporter: Reporter
): Promise<SongSuggestion[]> {
  try {
    const raw = await askForRecommendations(llm, playlistText, count);
    return parseSongSuggestions(cleanLlmResponse(raw));
  } catch (error) {
    reporter.error(describeError(error));
    return [];
  }
}

/**
 * Authenticate, read the playlist, ask the LLM for `count` similar songs,
 * resolve them through search and append whatever resolved.
 *
 * Fatal errors (config, operator input, auth) reject; every other failure is
 * reported and the run carries on.
 */
export async function runPlaylistRecommender(deps: WorkflowDeps): Promise<RunResult> {
  const { config, options, prompter, reporter } = deps;

  const count = await resolveCount(options, prompter);

  const authStrategy =
    deps.authStrategy ??
    createAuthStrategy(
      config.spotify,
      createSpotifyAuthGateway(config.spotify),
      prompter,
      reporter,
      options.code
    );
  const accessToken = await authStrategy.obtainAccessToken();
  log(`Authenticated with the ${authStrategy.flow} flow`);

  const spotify = deps.createSpotifyApi
    ? deps.createSpotifyApi(accessToken)
    : createUserSpotifyApi(config.spotify, accessToken);
  const llm = deps.llm ?? createLlmClient(config.llm);

  const playlistText = await readPlaylistText(spotify, config.playlistId, reporter);
  const suggestions = await requestSuggestions(llm, playlistText, count, reporter);
  log(`LLM suggested ${suggestions.length} songs`);

  const { uris, unresolved } = await resolveSuggestions(spotify, suggestions, (song, error) => {
    reporter.error(`Error finding song '${song.name} - ${song.artist}': ${describeError(error)}`);
  });

  const result: RunResult = {
    playlistText,
    suggestions,
    resolvedUris: uris,
    unresolved,
    added: 0,
  };

  if (!uris.length) {
    reporter.info("No tracks were resolved; playlist left unchanged.");
    return result;
  }

  if (options.dryRun) {
    reporter.info(`Dry run: would add ${uris.length} songs to the playlist:`);
    uris.forEach((uri) => reporter.info(`  ${uri}`));
    return result;
  }

  try {
    result.added = await addTracks(spotify, config.playlistId, uris);
    reporter.info(`Successfully added ${result.added} songs to the playlist.`);
  } catch (error) {
    if (error instanceof PartialAddError) {
      result.added = error.added;
      reporter.error(error.message);
    } else {
      reporter.error(`Failed to add tracks to playlist: ${describeError(error)}`);
    }
  }

  return result;
}
