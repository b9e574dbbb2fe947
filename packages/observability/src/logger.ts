import pino from "pino";
import type { LoggerOptions } from "pino";

export type Logger = pino.Logger;
export type PinoLoggerOptions = LoggerOptions;
export type LogDestination = "stdout" | "stderr";

export function createPinoOptions(params: {
  env: string;
  level: string;
  service: string;
}): PinoLoggerOptions {
  return {
    level: params.level,
    base: {
      env: params.env,
      service: params.service,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

// Records go to stdout unless `destination` names stderr or a stream.
export function createLogger(params: {
  env: string;
  level: string;
  service: string;
  destination?: LogDestination | pino.DestinationStream;
}): Logger {
  const { destination } = params;
  if (typeof destination === "object") {
    return pino(createPinoOptions(params), destination);
  }
  return pino(createPinoOptions(params), pino.destination(destination === "stderr" ? 2 : 1));
}
