#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { loadRuntimeConfig } from "./config/runtime.js";
import { configureLogging, logError, logInfo } from "./shared/logging.js";
import { startServer } from "./mcp/server.js";

async function start(): Promise<void> {
  loadDotenv();
  const runtime = loadRuntimeConfig();
  configureLogging({ level: runtime.logLevel });
  logInfo("bootstrap", "startup_begin", { transport: runtime.transport.kind });
  await startServer(runtime);
}

start().catch(error => {
  const reason = error instanceof Error ? error.message : String(error);
  logError("bootstrap", "startup_failed", { reason });
  process.exitCode = 1;
});
