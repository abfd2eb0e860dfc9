import type { LogLevel } from "../logger.js";
import { type Env, readBool, readEnum, readInt, readOptionalString } from "./env.js";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Settings of the CLI and its logger. Algorithms never read them. */
export interface Settings {
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  /** Log observer events while analyses run. */
  readonly narrate: boolean;
  /** Cap on the cycles listed by the `cycles` analysis. */
  readonly cycleLimit: number;
}

export const DEFAULT_SETTINGS: Settings = {
  logLevel: "info",
  logFile: null,
  narrate: false,
  cycleLimit: 20,
};

export function loadSettings(env: Env = process.env): Settings {
  return {
    logLevel: readEnum("GRAPH_PRIMER_LOG_LEVEL", LOG_LEVELS, DEFAULT_SETTINGS.logLevel, env),
    logFile: readOptionalString("GRAPH_PRIMER_LOG_FILE", env) ?? DEFAULT_SETTINGS.logFile,
    narrate: readBool("GRAPH_PRIMER_NARRATE", DEFAULT_SETTINGS.narrate, env),
    cycleLimit: readInt("GRAPH_PRIMER_CYCLE_LIMIT", DEFAULT_SETTINGS.cycleLimit, { min: 1, max: 1000 }, env),
  };
}
