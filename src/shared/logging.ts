import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import type { LogLevel } from "../config/runtime.js";
import { redactString, redactUnknown } from "./redaction.js";

type LogExtras = Record<string, unknown> | undefined;

type LogContext = { correlationId: string };

export type Logger = {
  debug(message: string, extras?: LogExtras): void;
  info(message: string, extras?: LogExtras): void;
  warn(message: string, extras?: LogExtras): void;
  error(message: string, extras?: LogExtras): void;
};

const levelWeights: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let currentThreshold = levelWeights.info;

const context = new AsyncLocalStorage<LogContext>();

export function configureLogging(options: { level: LogLevel }): void {
  currentThreshold = levelWeights[options.level];
}

export function withCorrelationId<T>(correlationId: string, fn: () => T): T {
  return context.run({ correlationId }, fn);
}

export function newCorrelationId(): string {
  return randomUUID();
}

export function getCorrelationId(): string | undefined {
  return context.getStore()?.correlationId;
}

export function logInfo(subsystem: string, msg: string, extras?: LogExtras): void {
  writeLog("info", subsystem, msg, extras);
}

export function logWarn(subsystem: string, msg: string, extras?: LogExtras): void {
  writeLog("warn", subsystem, msg, extras);
}

export function logError(subsystem: string, msg: string, extras?: LogExtras): void {
  writeLog("error", subsystem, msg, extras);
}

export function logDebug(subsystem: string, msg: string, extras?: LogExtras): void {
  writeLog("debug", subsystem, msg, extras);
}

export function createLogger(subsystem: string): Logger {
  return {
    debug(message, extras) {
      logDebug(subsystem, message, extras);
    },
    info(message, extras) {
      logInfo(subsystem, message, extras);
    },
    warn(message, extras) {
      logWarn(subsystem, message, extras);
    },
    error(message, extras) {
      logError(subsystem, message, extras);
    }
  };
}

function shouldLog(level: LogLevel): boolean {
  return levelWeights[level] >= currentThreshold;
}

// stdout is reserved for the stdio MCP transport.
function writeLog(level: LogLevel, subsystem: string, message: string, extras?: LogExtras): void {
  if (!shouldLog(level)) {
    return;
  }
  const base: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    subsystem,
    msg: redactString(message)
  };
  const correlationId = getCorrelationId();
  if (correlationId) {
    base.correlationId = correlationId;
  }
  const sanitizedExtras = extras ? redactUnknown(extras) : undefined;
  const payload =
    sanitizedExtras && typeof sanitizedExtras === "object" && !Array.isArray(sanitizedExtras)
      ? { ...sanitizedExtras, ...base }
      : base;
  process.stderr.write(`${JSON.stringify(payload)}\n`);
}
