import { z } from "zod";
import { DEFAULT_NUT_PORT, DEFAULT_TIMEOUT_MS } from "@upsctl/schemas";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/** Fallbacks for flags that were not given on the command line. */
export interface CliDefaults {
  host?: string;
  port: string;
  ups?: string;
  username?: string;
  password?: string;
  timeoutMs: string;
  logLevel: LogLevel;
}

export function loadCliDefaults(env: NodeJS.ProcessEnv = process.env): CliDefaults {
  const logLevel = LogLevelSchema.safeParse(env.LOG_LEVEL ?? "warn");
  return {
    host: env.NUT_HOST || undefined,
    port: env.NUT_PORT ?? String(DEFAULT_NUT_PORT),
    ups: env.NUT_UPS || undefined,
    username: env.NUT_USERNAME || undefined,
    password: env.NUT_PASSWORD || undefined,
    timeoutMs: env.NUT_TIMEOUT_MS ?? String(DEFAULT_TIMEOUT_MS),
    logLevel: logLevel.success ? logLevel.data : "warn"
  };
}
