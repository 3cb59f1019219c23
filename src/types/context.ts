/**
 * Crawl context - flows through the whole run
 * Built once by the CLI; the crawler and stats modules read what they need
 */

import type { CrawlerConfig } from "./config";
import type { FailureCause } from "./outcome";
import type { ComicSource, ImageSource } from "./source";
import type { ComicStore } from "../storage/comic-store";
import type { Logger } from "../utils/logger";
import type { Sleeper } from "../utils/sleep";
import type { Tracker, IdentifierReport } from "../utils/tracker";

// Re-export types from tracker
export type {
  IdentifierStatus,
  IdentifierReport,
  RunIssue,
  RunSummary,
} from "../utils/tracker";

export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Which identifiers to visit
 * - single: exactly one comic
 * - range: start..end inclusive
 * - latest: start..the newest comic, looked up once before the run
 */
export type CrawlPlan =
  | { mode: "single"; identifier: number }
  | { mode: "range"; start: number; end: number }
  | { mode: "latest"; start: number };

export type CrawlEvent =
  | { type: "range-resolved"; start: number; end: number }
  | { type: "identifier-start"; identifier: number }
  | {
      type: "retry";
      identifier: number;
      attempt: number;
      delay: number;
      cause: FailureCause;
    }
  | { type: "identifier-done"; report: IdentifierReport };

export interface CrawlContext {
  config: CrawlerConfig;
  logger: Logger;

  // Run summary accumulator
  tracker: Tracker;

  source: ComicSource;
  images: ImageSource;
  store: ComicStore;

  // Injected so tests never wait on real timers
  sleep: Sleeper;
  onProgress?: (event: CrawlEvent) => void;
}
