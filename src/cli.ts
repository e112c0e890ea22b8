#!/usr/bin/env node
import { CLIParser, USAGE } from "./args.js";
import { runCommand } from "./commands.js";
import { openStore } from "./db.js";
import { createLogger } from "./logger.js";

async function main(): Promise<number> {
  const options = new CLIParser().parse();

  if (options.help || options.command === null) {
    console.log(USAGE);
    return 0;
  }

  const store = await openStore(options.file, {
    recover: options.recover,
    logger: createLogger(options.logLevel),
  });

  try {
    return await runCommand(store, options.command, (line) => console.log(line));
  } finally {
    await store.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    createLogger("error").error(
      error instanceof Error ? error.message : String(error),
    );
    process.exitCode = 1;
  },
);
