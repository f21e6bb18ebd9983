import { z } from "zod";
import type { RenderOptions } from "@moira/core";
import { UsageError } from "./errors.js";

export const DEFAULT_OCTAVE = 4;

const TRUTHY = new Set(["1", "true", "yes", "on"]);

/**
 * An integer read from a flag or environment value. Blank strings count
 * as unset.
 */
const integerSetting = (label: string, min: number, max: number) => {
  const message = `${label} should be an integer between ${min} and ${max}`;
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.coerce.number({ invalid_type_error: message }).int(message).min(min, message).max(max, message).optional()
  );
};

const EnvSchema = z.object({
  MOIRA_PROGRAM: integerSetting("MOIRA_PROGRAM", 0, 127),
  MOIRA_VELOCITY: integerSetting("MOIRA_VELOCITY", 1, 127),
  MOIRA_CHANNEL: integerSetting("MOIRA_CHANNEL", 0, 15),
  MOIRA_QUIET: z
    .string()
    .optional()
    .transform((value) => value !== undefined && TRUTHY.has(value.trim().toLowerCase()))
});

const FlagSchema = z.object({
  program: integerSetting("--program", 0, 127),
  velocity: integerSetting("--velocity", 1, 127),
  channel: integerSetting("--channel", 0, 15),
  octave: integerSetting("--octave", -1, 9),
  quiet: z.boolean().optional()
});

/** Option values as they come off the command line. */
export interface CliFlags {
  program?: string;
  velocity?: string;
  channel?: string;
  octave?: string;
  quiet?: boolean;
}

export interface CliConfig {
  render: RenderOptions;
  octave: number;
  quiet: boolean;
}

function parseSettings<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new UsageError(result.error.issues[0].message);
  }
  return result.data;
}

/**
 * Merges command-line flags over `MOIRA_*` environment variables. Render
 * options left undefined fall back to the library defaults.
 *
 * @throws UsageError for values that are not integers in range
 */
export function resolveConfig(flags: CliFlags, env: Record<string, string | undefined>): CliConfig {
  const fromFlags = parseSettings(FlagSchema, flags);
  const fromEnv = parseSettings(EnvSchema, env);

  return {
    render: {
      program: fromFlags.program ?? fromEnv.MOIRA_PROGRAM,
      velocity: fromFlags.velocity ?? fromEnv.MOIRA_VELOCITY,
      channel: fromFlags.channel ?? fromEnv.MOIRA_CHANNEL
    },
    octave: fromFlags.octave ?? DEFAULT_OCTAVE,
    quiet: fromFlags.quiet ?? fromEnv.MOIRA_QUIET
  };
}
