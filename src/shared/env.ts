import { z } from "zod";
import { InvalidOptionsError } from "../game/errors.ts";
import { DEFAULT_BOARD_SIZE, MAX_BOARD_SIZE } from "../game/options.ts";

export const LogLevelSchema = z.enum(["error", "warn", "info", "debug"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Environment variables read by the self-play entry point.
 */
export const EnvSchema = z.object({
  /** Board side length; even, 4..26 */
  DRAUGHTS_BOARD_SIZE: z.coerce
    .number()
    .int()
    .min(4)
    .max(MAX_BOARD_SIZE)
    .refine((n) => n % 2 === 0, { message: "board size must be even" })
    .default(DEFAULT_BOARD_SIZE),

  /** Consecutive non-capturing turns before a tie; defaults to size²/2 */
  DRAUGHTS_TIE_MAX: z.coerce.number().int().positive().optional(),

  /** Seed for the random players; random when unset */
  DRAUGHTS_SEED: z.string().min(1).optional(),

  DRAUGHTS_LOG_LEVEL: LogLevelSchema.default("info"),

  /** Upper bound on turns in one self-play match */
  DRAUGHTS_MAX_TURNS: z.coerce.number().int().positive().default(1000),
});

export type Env = z.infer<typeof EnvSchema>;

export type RawEnv = Record<string, string | undefined>;

export function loadEnv(env: RawEnv): Env {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join(".") || "root"}: ${e.message}`);
    throw new InvalidOptionsError(`Invalid environment configuration: ${errors.join("; ")}`, { errors });
  }
  return result.data;
}
