import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { createLogger } from "../../utils/logger";

const logger = createLogger("config");

export const CONFIG_FILE_NAME = "analytics-bridge.json";

const persistedConfigSchema = z.object({
  /** Normally generated once and reused on every run. */
  anonymousId: z.string().min(1),
  /** userId → the anonymous id it was first connected to. */
  connectedIds: z.record(z.string()).default({}),
  userId: z.string().nullable().default(null),
  os: z.string().nullable().default(null),
  appVersion: z.string().nullable().default(null),
});

export type PersistedConfig = z.infer<typeof persistedConfigSchema>;

export function defaultConfig(anonymousId: string = uuidv4()): PersistedConfig {
  return {
    anonymousId,
    connectedIds: {},
    userId: null,
    os: null,
    appVersion: null,
  };
}

/**
 * JSON file holding the host's identity state between runs.
 */
export class ConfigStore {
  readonly filePath: string;

  constructor(configDir: string) {
    this.filePath = path.join(configDir, CONFIG_FILE_NAME);
  }

  /**
   * Reads the config file. A missing, unreadable or malformed file yields a
   * fresh config with a new anonymous id.
   */
  async load(): Promise<PersistedConfig> {
    logger.log("Loading config from", this.filePath);
    try {
      const raw: unknown = JSON.parse(await readFile(this.filePath, "utf8"));
      const parsed = persistedConfigSchema.safeParse(raw);
      if (parsed.success) return parsed.data;
      logger.log("Config file has an unexpected shape, starting fresh");
    } catch (err) {
      logger.log("No usable config file, starting fresh:", err);
    }
    return defaultConfig();
  }

  async save(config: PersistedConfig): Promise<void> {
    logger.log("Saving config to", this.filePath);
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(config), "utf8");
  }
}
