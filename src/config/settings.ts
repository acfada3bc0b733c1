import { z } from "zod";
import { expandPath } from "./paths.js";
import { type Config, configSchema, normalizeToken } from "./schema.js";
import { videoResolutionFor } from "../catalog/quality.js";

/**
 * Effective settings for one run: stored config with command-line overrides applied.
 */
export interface Settings extends Config {
  /** Resolution tier derived from `videoFormat`, e.g. "1080". */
  wantRes: string;
}

/**
 * Command-line overrides; an undefined entry means the flag was not given.
 * Values are validated together with the stored config.
 */
export type SettingsOverrides = { [K in keyof Config]?: unknown };

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Merges overrides onto the stored config and validates the result.
 * Undefined overrides leave the stored value in place.
 */
export function resolveSettings(config: Config, overrides: SettingsOverrides = {}): Settings {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const result = configSchema.safeParse({ ...config, ...defined });
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${z.prettifyError(result.error)}`);
  }

  const merged = result.data;
  return {
    ...merged,
    token: normalizeToken(merged.token),
    outPath: expandPath(merged.outPath),
    wantRes: videoResolutionFor(merged.videoFormat),
  };
}
