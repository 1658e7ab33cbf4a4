#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { loadCoachConfig, type CoachConfig } from "./config/coachConfig.js";
import { CachedFactsLoader } from "./facts/cache.js";
import { FilePatchFactsLoader } from "./facts/loader.js";
import { StructuredLogger } from "./logger.js";
import { PevOrchestrator } from "./pev/orchestrator.js";
import { PatchGuideCorpus } from "./retrieval/corpus.js";
import { createCoachServer } from "./server/tools.js";
import { HeuristicDraftGenerator } from "./strategy/heuristicGenerator.js";
import { PatchWinrateSignalSource } from "./threat/signals.js";

/** Wires the file-backed collaborators into an orchestrator and its MCP server. */
export function buildCoachRuntime(config: CoachConfig, logger: StructuredLogger) {
  const facts = new CachedFactsLoader(new FilePatchFactsLoader({ dataDir: config.dataDir, logger }));
  const orchestrator = new PevOrchestrator({
    facts,
    corpus: new PatchGuideCorpus(config.dataDir),
    generator: new HeuristicDraftGenerator(),
    signals: new PatchWinrateSignalSource(config.dataDir),
    logger,
    config,
  });
  const server = createCoachServer({ orchestrator, defaults: { defaultPatch: config.defaultPatch }, logger });
  return { facts, orchestrator, server };
}

async function main(): Promise<void> {
  const config = loadCoachConfig();
  const logger = new StructuredLogger({
    logFile: config.logFile,
    level: config.logLevel,
    redactionEnabled: config.logRedact,
  });
  const { server } = buildCoachRuntime(config, logger);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("stdio_listening", {
    data_dir: config.dataDir,
    default_patch: config.defaultPatch,
    max_attempts: config.maxAttempts,
  });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.warn("shutdown_signal", { signal });
    try {
      await server.close();
    } catch (error) {
      logger.error("transport_close_failed", { message: error instanceof Error ? error.message : String(error) });
    }
    await logger.flush();
    process.exit(0);
  };
  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  main().catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exit(1);
  });
}
