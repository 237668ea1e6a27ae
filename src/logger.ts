import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

const LOG_LEVEL = resolveLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE;

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Streams take no "silent" level; the root logger filters in that case
  const streamLevel: pino.Level = LOG_LEVEL === "silent" ? "fatal" : LOG_LEVEL;

  // Mirror everything to stdout and the log file
  const streams: pino.StreamEntry[] = [
    { level: streamLevel, stream: process.stdout },
    {
      level: streamLevel,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams) as DestinationStream;
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Child loggers for different modules
export const catalogLogger = logger.child({ module: "metbull" });
export const reconcileLogger = logger.child({ module: "reconcile" });
export const datasetLogger = logger.child({ module: "dataset" });
export const dbLogger = logger.child({ module: "database" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
