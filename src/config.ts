import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const flagSchema = z
  .enum(["1", "0", "true", "false"])
  .transform((value) => value === "1" || value === "true");

/**
 * Environment variables the CLI reads. Anything else in the environment is
 * ignored.
 */
export const envSchema = z.object({
  KEYBIND_MERGER_MINIFY: flagSchema.optional(),
  NO_COLOR: z.string().optional(),
});

export type CliConfig = {
  /** Minified output unless --pretty is given. */
  minify: boolean;
  /** ANSI colour on stderr/stdout. */
  color: boolean;
};

export type ConfigResult = { config: CliConfig; warnings: string[] };

export const DEFAULT_CONFIG: CliConfig = { minify: false, color: false };

// =============================================================================
// resolveConfig
// =============================================================================

/**
 * Build the CLI configuration from the environment.
 *
 * Colour is on only for a TTY and only while NO_COLOR is unset or empty.
 * An unrecognised KEYBIND_MERGER_MINIFY value is reported as a warning and
 * the default is kept.
 */
export function resolveConfig(
  env: Record<string, string | undefined> = process.env,
  isTTY: boolean = process.stdout.isTTY ?? false,
): ConfigResult {
  const warnings: string[] = [];
  const color = isTTY && !env.NO_COLOR;

  const parsed = envSchema.safeParse({
    KEYBIND_MERGER_MINIFY: env.KEYBIND_MERGER_MINIFY,
    NO_COLOR: env.NO_COLOR,
  });

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      warnings.push(`Ignoring ${issue.path.join(".")}: ${issue.message}`);
    }
    return { config: { ...DEFAULT_CONFIG, color }, warnings };
  }

  return {
    config: { minify: parsed.data.KEYBIND_MERGER_MINIFY ?? DEFAULT_CONFIG.minify, color },
    warnings,
  };
}
