import { MAX_BOARD_SIZE, MIN_BOARD_SIZE } from "@skirmish/shared";
import { z } from "zod";

export const dimensionSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, "Expected a whole number")
  .transform(Number)
  .pipe(z.number().int().min(MIN_BOARD_SIZE).max(MAX_BOARD_SIZE));

const optionalDimension = z.preprocess(
  (value) => (value === "" ? undefined : value),
  dimensionSchema.optional()
);

const envSchema = z.object({
  SKIRMISH_BOARD_WIDTH: optionalDimension,
  SKIRMISH_BOARD_HEIGHT: optionalDimension
});

export interface ConsoleConfig {
  width?: number;
  height?: number;
}

export type ConfigResult = { ok: true; value: ConsoleConfig } | { ok: false; error: string };

export const loadConfig = (env: Record<string, string | undefined> = process.env): ConfigResult => {
  const parseResult = envSchema.safeParse(env);
  if (!parseResult.success) {
    const details = parseResult.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return { ok: false, error: `Invalid configuration: ${details}` };
  }
  return {
    ok: true,
    value: {
      width: parseResult.data.SKIRMISH_BOARD_WIDTH,
      height: parseResult.data.SKIRMISH_BOARD_HEIGHT
    }
  };
};

export const parseDimension = (input: string): number | null => {
  const parseResult = dimensionSchema.safeParse(input);
  return parseResult.success ? parseResult.data : null;
};
