/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and a custom file
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { ConfigError, CrawlerConfig, PartialCrawlerConfig } from "../types";
import {
  CrawlerConfigSchema,
  PartialCrawlerConfigSchema,
} from "../types/config";
import { fileExists } from "./file-exists";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (XDG base directories on Linux)
const paths = envPaths("comic-crawler", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/comic-crawler or ~/.config/comic-crawler
 * - macOS: ~/Library/Preferences/comic-crawler
 * - Windows: %APPDATA%\comic-crawler
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<CrawlerConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return CrawlerConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if the file is not valid JSON or does not match the schema
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialCrawlerConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialCrawlerConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge a partial configuration over a complete one
 */
export function mergeConfig(
  base: CrawlerConfig,
  override: PartialCrawlerConfig,
): CrawlerConfig {
  return {
    output: override.output ?? base.output,
    source: { ...base.source, ...override.source },
    crawl: { ...base.crawl, ...override.crawl },
    retry: { ...base.retry, ...override.retry },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: CrawlerConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom config that fails to load is skipped and reported in `errors`
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (await fileExists(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
