#!/usr/bin/env node
import { runPlaylistRecommender } from "./app";
import { consoleReporter, createConsolePrompter } from "./cli/console";
import { USAGE, parseCliArgs } from "./cli/parseCliArgs";
import { loadConfig } from "./config/env";
import { describeError } from "./utils/errors";
import { log, setVerbose } from "./utils/logger";

export async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(process.env, {
    playlist: args.playlist ?? undefined,
    authFlow: args.authFlow ?? undefined,
    verbose: args.verbose || undefined,
  });
  setVerbose(config.verbose);
  log(`Using playlist ${config.playlistId} and model ${config.llm.model}`);

  const prompter = createConsolePrompter();
  try {
    await runPlaylistRecommender({
      config,
      options: {
        count: args.count ?? undefined,
        code: args.code ?? undefined,
        dryRun: args.dryRun,
      },
      prompter,
      reporter: consoleReporter,
    });
  } finally {
    prompter.close();
  }
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    }
  );
}
