#!/usr/bin/env node
import * as path from "node:path";
import { CommanderError } from "commander";
import { FileBlobStorage } from "./blob_storage.js";
import { parseConfig, type ServerConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { RecordStore } from "./record_store.js";
import { createEntryServer } from "./server.js";

function loadConfig(): ServerConfig {
  try {
    return parseConfig(process.argv.slice(2));
  } catch (exc) {
    // commander has already printed help or the error
    if (exc instanceof CommanderError) process.exit(exc.exitCode);
    throw exc;
  }
}

async function main(): Promise<void> {
  const cfg = loadConfig();
  setLogLevel(cfg.logLevel);

  const dataFile = path.resolve(cfg.dataFile);
  const store = new RecordStore(new FileBlobStorage(dataFile));
  const srv = createEntryServer({ store, maxConnections: cfg.maxConnections });
  logger.info(`data file ${dataFile}`);
  if (cfg.maxConnections === 0) logger.debug("no connection cap configured");

  const shutdown = (signal: string) => {
    logger.info(`received ${signal}, shutting down`);
    srv.close().then(
      () => process.exit(0),
      err => {
        logger.error("error closing server:", err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await srv.listen(cfg.port, cfg.host);
}

main().catch(err => {
  logger.error("fatal:", err);
  process.exit(1);
});
