import { z } from "zod";
import { InvalidOptionsError } from "./errors.ts";

export const DEFAULT_BOARD_SIZE = 8;
export const MAX_BOARD_SIZE = 26;

export const BoardSizeSchema = z
  .number()
  .int()
  .min(4)
  .max(MAX_BOARD_SIZE)
  .refine((n) => n % 2 === 0, { message: "board size must be even" });

export const GameOptionsSchema = z.object({
  size: BoardSizeSchema.default(DEFAULT_BOARD_SIZE),
  tieMax: z.number().int().positive().optional(),
});

export type GameOptions = z.input<typeof GameOptionsSchema>;

export interface ResolvedGameOptions {
  size: number;
  tieMax: number;
}

export function defaultTieMax(size: number): number {
  return (size * size) / 2;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`).join("; ");
}

export function resolveGameOptions(options: GameOptions = {}): ResolvedGameOptions {
  const parsed = GameOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidOptionsError(`Invalid game options: ${describeIssues(parsed.error)}`, { options });
  }
  const { size, tieMax } = parsed.data;
  return { size, tieMax: tieMax ?? defaultTieMax(size) };
}

export function assertBoardSize(size: number): number {
  const parsed = BoardSizeSchema.safeParse(size);
  if (!parsed.success) {
    throw new InvalidOptionsError(`Invalid board size ${size}: ${describeIssues(parsed.error)}`, { size });
  }
  return parsed.data;
}
