import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config/options";

export function createLogger(level: AppConfig["logLevel"]): Logger {
  return pino({
    level,
    base: { service: "sensorhub" },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { err: pino.stdSerializers.err, error: pino.stdSerializers.err },
  });
}
