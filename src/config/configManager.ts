import Conf from "conf";
import { APP_DIR, RESUME_DIR } from "./paths.js";
import { type Config, configSchema } from "./schema.js";
import { ensureDir } from "../shared/fs.js";

let store: Conf<Config> | undefined;

/**
 * The conf store under the app directory, opened on first use so that importing
 * this module never touches the disk.
 */
function getStore(): Conf<Config> {
  store ??= new Conf<Config>({
    projectName: "tapevault",
    cwd: APP_DIR,
    configName: "config",
    defaults: configSchema.parse({}),
  });
  return store;
}

export async function ensureAppDirectories(): Promise<void> {
  await Promise.all([APP_DIR, RESUME_DIR].map((dir) => ensureDir(dir)));
}

/**
 * Stored settings, validated and completed with defaults.
 */
export function loadConfig(): Config {
  return configSchema.parse(getStore().store);
}

/**
 * Validates the merged result before anything is written.
 */
export function updateConfig(updates: Partial<Record<keyof Config, unknown>>): Config {
  const updated = configSchema.parse({ ...loadConfig(), ...updates });
  getStore().store = updated;
  return updated;
}

export function getConfigValue<K extends keyof Config>(key: K): Config[K] {
  return loadConfig()[key];
}

export function getConfigPath(): string {
  return getStore().path;
}
