import pino from "pino";
import type { DestinationStream, LevelWithSilent, Logger } from "pino";

export type { Logger } from "pino";

export type LoggerOptions = {
  level?: LevelWithSilent;
  name?: string;
  /** Defaults to stderr so stdout stays reserved for command output. */
  destination?: DestinationStream;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? "warn",
    name: options.name ?? "mission-collab",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({ pid: bindings.pid, name: bindings.name })
    }
  };
  return pino(pinoOptions, options.destination ?? pino.destination(2));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
