import pino from "pino";

export type Logger = pino.BaseLogger;

export type LogLevel = pino.LevelWithSilent;

export function createLogger(name: string, level: LogLevel = "info"): pino.Logger {
  return pino({ name, level });
}
