import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

const STREAM_LEVELS: readonly pino.Level[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

function streamLevel(level: string): pino.Level {
  return STREAM_LEVELS.find((candidate) => candidate === level) ?? "info";
}

// Build the destination stream
function createDestination(): pino.MultiStreamRes | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // stdout plus the log file
  const streams: pino.StreamEntry[] = [
    { level: streamLevel(LOG_LEVEL), stream: process.stdout },
    {
      level: streamLevel(LOG_LEVEL),
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

// Call sites log failures under `error`; pino only serializes `err` by default
const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: { service: "ecuador-sync" },
  serializers: { error: pino.stdSerializers.err },
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Request logging for Fastify, written to the same destination
export const fastifyLoggerConfig = {
  level: LOG_LEVEL,
  serializers: loggerOptions.serializers,
  ...(destination !== undefined ? { stream: destination } : {}),
};

// One child per subsystem
export const sparqlLogger = logger.child({ module: "sparql" });
export const dbLogger = logger.child({ module: "database" });
export const syncLogger = logger.child({ module: "sync" });
export const serverLogger = logger.child({ module: "server" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
