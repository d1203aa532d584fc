#!/usr/bin/env tsx
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

import { indexUrl, loadConfig } from "../../config/config.js";
import { createLogger } from "../../logging/logger.js";
import type { DecisionProvider } from "../../core/types.js";
import { CatalogAuthError, ConfigurationError } from "../../core/errors.js";
import { HttpPageSource } from "../../source/page-source.js";
import { WorkListHarvester } from "../../source/work-list-harvester.js";
import { CitationExtractor } from "../../source/citation-extractor.js";
import { RequestPacer } from "../../orchestrator/request-pacer.js";
import { PlaylistPipeline } from "../../orchestrator/playlist-pipeline.js";
import { SpotifyCatalogClient } from "../../catalog/spotify-catalog-client.js";
import { CatalogResolver } from "../../resolver/catalog-resolver.js";
import {
  AutoDecisionProvider,
  ConsoleDecisionProvider,
  createReadlinePrompt,
} from "../../resolver/decision-provider.js";
import { applyCliOverrides, parseCliArgs } from "./cli-options.js";
import { printBanner, printEvent, printSummary } from "./progress.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = join(__dirname, "..", "..", "..");

async function main(): Promise<void> {
  const opts = parseCliArgs(
    process.argv.slice(2),
    join(PROJECT_ROOT, "config", "standards-playlist.yaml"),
  );
  const config = applyCliOverrides(loadConfig({ configPath: opts.configPath }), opts);
  const logger = createLogger(config.logging);

  printBanner(config, opts.dryRun);

  const catalog = SpotifyCatalogClient.fromConfig(config.catalog, logger);
  if (!opts.dryRun && !catalog.canModifyPlaylists) {
    throw new ConfigurationError(
      "SPOTIFY_REFRESH_TOKEN is required to create a playlist (use --dry-run to resolve only)",
    );
  }
  await catalog.connect();

  const source = new HttpPageSource(config.source, logger);
  const harvester = new WorkListHarvester(
    source,
    {
      indexUrl: indexUrl(config),
      linkPattern: new RegExp(config.source.workLinkPattern),
      topN: config.source.topN,
    },
    logger,
  );
  const extractor = new CitationExtractor(
    source,
    new RequestPacer(config.source.minIntervalMs),
    { maxRecordings: config.source.maxRecordings },
    logger,
  );

  const readline = config.resolver.interactive ? createReadlinePrompt() : null;
  const decisions: DecisionProvider = readline
    ? new ConsoleDecisionProvider(readline.prompt)
    : new AutoDecisionProvider(config.resolver.acceptWeakMatches);

  const resolver = new CatalogResolver(
    catalog,
    decisions,
    { searchLimit: config.catalog.searchLimit },
    logger,
  );

  const pipeline = new PlaylistPipeline(
    { harvester, extractor, resolver, catalog, logger },
    { playlist: config.playlist, dryRun: opts.dryRun, onProgress: printEvent },
  );

  try {
    const summary = await pipeline.run();
    if (summary.status === "empty") {
      console.error("No works found on the index page. Nothing to do.");
      process.exitCode = 1;
      return;
    }
    printSummary(summary);
  } finally {
    readline?.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError || err instanceof CatalogAuthError) {
    console.error(err.message);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
