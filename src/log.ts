import fs from "node:fs";
import path from "node:path";

import pino, { multistream } from "pino";

import { ConfigError, errorMessage } from "./errors.js";

export type Logger = pino.Logger;

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export function createLogger(level: LogLevel, filePath?: string, fileLevel?: LogLevel): Logger {
  if (!filePath) {
    return pino({ level, base: { service: "gnmi-dialout" } });
  }
  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new ConfigError(`Cannot create log directory ${dir}: ${errorMessage(err)}`);
  }
  const streams = [
    { level, stream: process.stdout },
    {
      level: fileLevel ?? level,
      stream: pino.destination({ dest: filePath, sync: false }),
    },
  ];
  return pino({ level: "trace", base: { service: "gnmi-dialout" } }, multistream(streams));
}
