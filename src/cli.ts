#!/usr/bin/env node
import { ConfigError, isAbortError, stringifyError } from "./common/errors.js";
import { buildRunConfig } from "./config.js";
import { Logger } from "./logger.js";
import { runApply, runCombine, runShard } from "./orchestrator.js";
import type { RunConfig } from "./types.js";

const EXIT_ABORTED = 130;

async function main(): Promise<number> {
  const config = buildRunConfig(process.argv.slice(2), process.env);
  const logger = new Logger({ debugEnabled: config.debug });
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`Received ${signal}, stopping after the current step.`);
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  try {
    return await dispatch(config, logger, controller.signal);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

async function dispatch(config: RunConfig, logger: Logger, signal: AbortSignal): Promise<number> {
  switch (config.mode) {
    case "scrape": {
      const summary = await runShard(config, logger, { signal });
      process.stdout.write(
        `Finished shard ${summary.shardId}/${summary.totalShards}. processed=${summary.processed} ` +
          `correct=${summary.correct} swapped=${summary.swapped} errors=${summary.errors}\n`,
      );
      return summary.aborted ? EXIT_ABORTED : 0;
    }
    case "combine":
      await runCombine(config, logger);
      return 0;
    case "apply":
      await runApply(config, logger);
      return 0;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (isAbortError(error)) {
      process.stderr.write("Aborted.\n");
      process.exit(EXIT_ABORTED);
    }
    const prefix = error instanceof ConfigError ? "Configuration error" : "Fatal error";
    process.stderr.write(`${prefix}: ${stringifyError(error)}\n`);
    process.exit(1);
  });
