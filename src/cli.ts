#!/usr/bin/env tsx
import { loadConfig, parseArgs, printHelp } from "./config";
import { createGitHubClient, getOctokit } from "./github";
import { createLogger } from "./logger";
import { createServer } from "./server";
import { serve } from "./transport";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printHelp((s) => process.stdout.write(s));
    return;
  }

  const config = loadConfig(process.env, args.overrides);
  const logger = createLogger({ debug: config.debug, json: config.logFormat === "json" });
  if (!config.githubToken) logger.warn("No GitHub token configured; only public repositories can be read.");

  const github = createGitHubClient({
    octokit: getOctokit(config.githubToken),
    cacheTtlMs: config.cacheTtlSecs * 1000,
    logger
  });
  const deps = { github, logger, maxTeamDepth: config.maxTeamDepth };
  const stop = await serve(config, () => createServer(deps), logger);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    stop().then(
      () => process.exit(0),
      (e: unknown) => {
        logger.error(`Shutdown failed: ${e instanceof Error ? e.message : String(e)}`);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e: unknown) => {
  process.stderr.write((e instanceof Error ? e.message : String(e)) + "\n");
  process.exitCode = 1;
});
