import { AuthFlow, parseAuthFlow } from "../config/env";
import { InputError } from "../utils/errors";

export interface CliArgs {
  count: number | null;
  playlist: string | null;
  authFlow: AuthFlow | null;
  code: string | null;
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: playlist-recommender [options]

Options:
  --count <n>         number of songs to add (prompted when omitted)
  --playlist <ref>    playlist id, spotify:playlist: URI or open.spotify.com URL
  --auth <flow>       code | client-credentials
  --code <code>       authorization code (skips the browser prompt)
  --dry-run           resolve suggestions without modifying the playlist
  --verbose           print diagnostic logs to stderr
  -h, --help          show this message`;

/**
 * Parses the operator's count answer or `--count` value. Anything other than
 * a positive integer ends the run.
 */
export function parseSongCount(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InputError(`Please enter a valid number (got "${trimmed}").`);
  }
  const n = Number(trimmed);
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new InputError(`Please enter a number greater than zero (got "${trimmed}").`);
  }
  return n;
}

function requireValue(argv: string[], i: number, flag: string): string {
  const val = argv[i];
  if (val === undefined || val.startsWith("--")) {
    throw new InputError(`${flag} needs a value`);
  }
  return val;
}

// Skips node and the script path.
export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    count: null,
    playlist: null,
    authFlow: null,
    code: null,
    dryRun: false,
    verbose: false,
    help: false,
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--count":
      case "-n":
        result.count = parseSongCount(requireValue(argv, ++i, arg));
        break;
      case "--playlist":
        result.playlist = requireValue(argv, ++i, arg);
        break;
      case "--auth":
        result.authFlow = parseAuthFlow(requireValue(argv, ++i, arg));
        break;
      case "--code":
        result.code = requireValue(argv, ++i, arg);
        break;
      case "--dry-run":
      case "--dry":
        result.dryRun = true;
        break;
      case "--verbose":
        result.verbose = true;
        break;
      case "--help":
      case "-h":
        result.help = true;
        break;
      default:
        throw new InputError(`Unknown argument: ${arg}`);
    }
  }
  return result;
}
