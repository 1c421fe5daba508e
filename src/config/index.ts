/**
 * Process configuration loaded from environment variables.
 * Uses zod for runtime validation.
 *
 * Read by process entry points only; the engine library itself runs on
 * DEFAULT_ENGINE_CONFIG unless handed a config.
 */

import { z } from "zod";
import dotenv from "dotenv";
import { loadEngineConfig, type EngineConfig } from "./engine.js";
import { SymbolSchema } from "../utils/validation.js";

const ConfigSchema = z.object({
  // Engine thresholds / tables (JSON file; defaults when unset)
  engineConfigPath: z.string().optional(),

  // Sizing
  accountCapital: z.coerce.number().positive().optional(),

  // Symbols the poll loop evaluates
  symbols: z
    .string()
    .default("SPX,SPY")
    .transform((s) =>
      s
        .split(",")
        .map((t) => t.trim().toUpperCase())
        .filter((t) => t.length > 0)
    )
    .pipe(z.array(SymbolSchema).min(1)),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.string().default("development"),
});

export type Config = z.infer<typeof ConfigSchema> & { engine: EngineConfig };

/**
 * Build the process config. With the real environment, a `.env` file is
 * loaded first. Throws with the zod issue text on invalid values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (env === process.env) dotenv.config();

  const raw = {
    engineConfigPath: env.ENGINE_CONFIG_PATH || undefined,
    accountCapital: env.ACCOUNT_CAPITAL || undefined,
    symbols: env.SIGNAL_SYMBOLS || undefined,
    logLevel: env.LOG_LEVEL || undefined,
    nodeEnv: env.NODE_ENV || undefined,
  };

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment config: ${issues}`);
  }

  const settings = result.data;
  const engine = loadEngineConfig(settings.engineConfigPath);

  return {
    ...settings,
    engine:
      settings.accountCapital !== undefined
        ? { ...engine, sizing: { ...engine.sizing, accountCapital: settings.accountCapital } }
        : engine,
  };
}
