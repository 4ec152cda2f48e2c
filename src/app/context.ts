/**
 * AppContext: composition root shared by the CLI commands.
 *
 * Commands receive the logger and the parsed runtime configuration from here
 * instead of reaching for module-level singletons, so each merge run is
 * wired explicitly.
 */

import pino, { type Logger } from "pino";
import { runtimeConfig, type RuntimeConfig } from "../config.js";

export interface AppContext {
  logger: Logger;
  config: RuntimeConfig;
}

// -----------------------------------------------------------------------------
// Logger factory
// -----------------------------------------------------------------------------

/**
 * Structured logs go to stderr so that stdout stays free for command output.
 */
export function createLogger(config: Pick<RuntimeConfig, "logLevel" | "logPretty"> = runtimeConfig): Logger {
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    base: { service: "waiver-merger" },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (config.logPretty) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname,service",
        },
      },
    });
  }

  const destination = pino.destination({ dest: 2, sync: true });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino(options, destination);
}

export function createContext(config: RuntimeConfig = runtimeConfig): AppContext {
  return {
    logger: createLogger(config),
    config,
  };
}
