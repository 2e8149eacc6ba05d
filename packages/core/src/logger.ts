import pino from "pino";

export type { Logger } from "pino";

/**
 * Structured JSON logger for the node and its API.
 * Level comes from LOG_LEVEL unless overridden.
 */
export function createLogger(options?: pino.LoggerOptions, destination?: pino.DestinationStream) {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || "info",
    serializers: {
      err: pino.stdSerializers.err
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options
  };
  return destination ? pino(config, destination) : pino(config);
}
