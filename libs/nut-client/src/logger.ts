import pino, { type DestinationStream, type LevelWithSilent, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  name?: string;
  level?: LevelWithSilent;
  /** Defaults to stderr so that stdout carries only command output. */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? "upsctl",
      level: options.level ?? "info"
    },
    options.destination ?? pino.destination({ fd: 2, sync: true })
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
