/**
 * Central type exports
 */

// Configuration
export type {
  CrawlerConfig,
  PartialCrawlerConfig,
  SourceConfig,
  CrawlConfig,
  RetryConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  CrawlerConfigSchema,
  PartialCrawlerConfigSchema,
} from "./config";

// Comics
export type { ComicRecord, ComicMetadata, ComicPayload } from "./comic";
export {
  ComicMetadataSchema,
  ComicPayloadSchema,
  LatestPayloadSchema,
} from "./comic";

// Outcomes
export type {
  FailureKind,
  FailureCause,
  FetchOutcome,
  SuccessOutcome,
  NotFoundOutcome,
  TransientFailureOutcome,
  PermanentSkipOutcome,
  ImageOutcome,
  LatestOutcome,
  SaveOutcome,
} from "./outcome";

// Sources
export type { ComicSource, ImageSource } from "./source";

// Context
export type {
  ConfigError,
  CrawlContext,
  CrawlEvent,
  CrawlPlan,
  IdentifierStatus,
  IdentifierReport,
  RunIssue,
  RunSummary,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
