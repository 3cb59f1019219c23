/**
 * Comic sources export
 */

import type { ComicSource, SourceConfig } from "../types";
import type { HttpClient } from "../utils/http-client";
import type { Logger } from "../utils/logger";
import { FallbackComicSource } from "./fallback-source";
import { JsonComicSource } from "./json-source";
import { PageComicSource } from "./page-source";

export { JsonComicSource } from "./json-source";
export { PageComicSource } from "./page-source";
export { FallbackComicSource } from "./fallback-source";
export { HttpImageSource } from "./image-source";

/**
 * Build the comic source for a configuration
 * JSON endpoint first, page scraping as fallback unless disabled
 */
export function createComicSource(
  config: SourceConfig,
  client: HttpClient,
  logger: Logger,
): ComicSource {
  const primary = new JsonComicSource(client, config.baseUrl);
  if (!config.fallback) {
    return primary;
  }
  return new FallbackComicSource(
    primary,
    new PageComicSource(client, config.baseUrl),
    logger,
  );
}
