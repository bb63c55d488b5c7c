import { pino } from "pino";
import type { BaseLogger, LevelWithSilent } from "pino";

export type Logger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export type LoggerOptions = {
  name?: string;
  level?: LevelWithSilent;
};

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function levelFromEnv(value: string | undefined): LevelWithSilent {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? "info";
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "mqtt-discoverable",
    level: options.level ?? levelFromEnv(process.env.LOG_LEVEL),
  });
}
