import path from "node:path";
import { z } from "zod";
import { StartupError } from "./errors.js";
import { TITLE_PATTERN } from "./title.js";

const EnvSchema = z.object({
  HOST: z.string().min(1).default("localhost"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  PAGES_DIR: z.string().min(1).default("."),
  TEMPLATES_DIR: z.string().min(1).default("templates"),
  FRONT_PAGE: z.string().regex(TITLE_PATTERN, "must be letters and digits only").default("FrontPage"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type LogLevel = z.infer<typeof EnvSchema>["LOG_LEVEL"];

export interface WikiConfig {
  host: string;
  port: number;
  pagesDir: string;
  templatesDir: string;
  frontPage: string;
  logLevel: LogLevel;
}

export type ConfigResult =
  | { ok: true; config: WikiConfig }
  | { ok: false; error: StartupError };

/**
 * Reads the server configuration from the environment. Relative
 * directories resolve against the working directory, and a variable set
 * to the empty string counts as unset. Throws a ZodError naming the
 * offending variable when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WikiConfig {
  const set = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== ""));
  const e = EnvSchema.parse(set);
  return {
    host: e.HOST,
    port: e.PORT,
    pagesDir: path.resolve(e.PAGES_DIR),
    templatesDir: path.resolve(e.TEMPLATES_DIR),
    frontPage: e.FRONT_PAGE,
    logLevel: e.LOG_LEVEL,
  };
}

export function readConfig(env: NodeJS.ProcessEnv = process.env): ConfigResult {
  try {
    return { ok: true, config: loadConfig(env) };
  } catch (err) {
    return { ok: false, error: new StartupError("invalid configuration", err) };
  }
}
