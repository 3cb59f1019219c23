/**
 * Utility exports
 */

// Naming utilities
export { sanitizeTitle, FALLBACK_TITLE, MAX_TITLE_LENGTH } from "./sanitize-title";
export {
  formatIdentifier,
  imageExtension,
  comicImageFilename,
  comicMetadataFilename,
  DEFAULT_IMAGE_EXTENSION,
} from "./comic-filename";
export { createComicRecord } from "./create-comic-record";
export type { ComicFields } from "./create-comic-record";

// Filesystem utilities
export { fileExists, fileHasContent } from "./file-exists";
export { writeFileAtomic } from "./write-file-atomic";

// Network utilities
export { HttpClient } from "./http-client";
export type { HttpClientOptions } from "./http-client";

// Errors
export { HttpError, CrawlSetupError } from "./errors";
export {
  classifyRequestError,
  classifyPersistenceError,
  systemErrorCode,
} from "./classify-error";

// Retry
export { withRetry, backoffDelay } from "./retry";
export type { RetryOptions, RetryResult, RetryEvent } from "./retry";
export { sleep } from "./sleep";
export type { Sleeper } from "./sleep";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
