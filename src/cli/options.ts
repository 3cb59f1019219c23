/**
 * Crawl command options: validation, config overrides and crawl plan
 */

import { z } from "zod";
import type { CrawlerConfig, CrawlPlan } from "../types";

const identifier = z.coerce.number().int().positive();

export const CrawlOptionsSchema = z
  .object({
    start: identifier.optional(),
    end: identifier.optional(),
    single: identifier.optional(),
    max: identifier.optional(),
    output: z.string().min(1).optional(),
    delay: z.coerce.number().nonnegative().optional(), // In seconds
    config: z.string().optional(),
    fallback: z.boolean().optional(),
    verbose: z.boolean().optional(),
  })
  .refine(
    (options) =>
      options.start === undefined ||
      options.end === undefined ||
      options.start <= options.end,
    { message: "--start must not be greater than --end", path: ["start"] },
  );

export type CrawlOptions = z.infer<typeof CrawlOptionsSchema>;

/**
 * Apply command-line options over the loaded configuration
 */
export function applyOptions(
  config: CrawlerConfig,
  options: CrawlOptions,
): CrawlerConfig {
  return {
    ...config,
    output: options.output ?? config.output,
    source: {
      ...config.source,
      // commander defaults --no-fallback to true; only an explicit opt-out counts
      fallback: options.fallback === false ? false : config.source.fallback,
    },
    crawl: {
      delay:
        options.delay !== undefined
          ? Math.round(options.delay * 1000)
          : config.crawl.delay,
      maxDownloads: options.max ?? config.crawl.maxDownloads,
    },
    logging: {
      ...config.logging,
      level: options.verbose ? "debug" : config.logging.level,
    },
  };
}

/**
 * Decide which identifiers to visit
 * --single wins; otherwise --end bounds the range, and without it the run
 * goes up to the latest published comic.
 */
export function planFromOptions(options: CrawlOptions): CrawlPlan {
  if (options.single !== undefined) {
    return { mode: "single", identifier: options.single };
  }

  const start = options.start ?? 1;
  if (options.end !== undefined) {
    return { mode: "range", start, end: options.end };
  }
  return { mode: "latest", start };
}
