/**
 * Crawler Module
 * Walks the identifier range in ascending order, one comic at a time:
 * skip what is already on disk, fetch and save the rest with retries, and
 * pause between network requests.
 */

import type {
  CrawlContext,
  CrawlPlan,
  FetchOutcome,
  IdentifierReport,
  RunSummary,
} from "../types";
import { CrawlSetupError } from "../utils/errors";
import { withRetry } from "../utils/retry";

interface IdentifierRange {
  start: number;
  end: number;
}

// ============================================================================
// Setup
// ============================================================================

async function prepareOutput(ctx: CrawlContext): Promise<void> {
  try {
    await ctx.store.prepare();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CrawlSetupError(
      `Cannot prepare output directory ${ctx.store.outputDir}: ${message}`,
      { cause: error },
    );
  }
}

async function resolveRange(
  ctx: CrawlContext,
  plan: CrawlPlan,
): Promise<IdentifierRange> {
  switch (plan.mode) {
    case "single":
      return { start: plan.identifier, end: plan.identifier };
    case "range":
      return { start: plan.start, end: plan.end };
    case "latest": {
      const latest = await ctx.source.latest();
      if (latest.type === "unavailable") {
        throw new CrawlSetupError(
          `Could not determine the latest comic: ${latest.cause.message}`,
        );
      }
      return { start: plan.start, end: latest.identifier };
    }
  }
}

// ============================================================================
// Per-comic processing
// ============================================================================

/**
 * One attempt: metadata, then image bytes, then both written to disk
 */
async function attemptComic(
  ctx: CrawlContext,
  identifier: number,
): Promise<FetchOutcome> {
  const outcome = await ctx.source.fetch(identifier);
  if (outcome.type !== "success") {
    return outcome;
  }

  const image = await ctx.images.fetch(outcome.record);
  if (image.type !== "image") {
    return image;
  }

  const saved = await ctx.store.save(outcome.record, image.bytes);
  if (saved.type === "failed") {
    return { type: "transient-failure", identifier, cause: saved.cause };
  }

  return outcome;
}

function toReport(
  identifier: number,
  outcome: FetchOutcome,
  attempts: number,
): IdentifierReport {
  switch (outcome.type) {
    case "success":
      return {
        identifier,
        status: "downloaded",
        attempts,
        filename: outcome.record.filename,
      };
    case "not-found":
      return { identifier, status: "skipped-missing", attempts };
    case "permanent-skip":
      return {
        identifier,
        status: "skipped-unavailable",
        attempts,
        detail: outcome.reason,
      };
    case "transient-failure":
      return {
        identifier,
        status: "failed",
        attempts,
        detail: `${outcome.cause.message} (${outcome.cause.kind}, ${attempts} attempt${attempts === 1 ? "" : "s"})`,
      };
  }
}

async function processIdentifier(
  ctx: CrawlContext,
  identifier: number,
): Promise<IdentifierReport> {
  if (await ctx.store.exists(identifier)) {
    return { identifier, status: "skipped-existing", attempts: 0 };
  }

  const { outcome, attempts } = await withRetry(
    () => attemptComic(ctx, identifier),
    {
      ...ctx.config.retry,
      sleep: ctx.sleep,
      onRetry: (event) =>
        ctx.onProgress?.({ type: "retry", identifier, ...event }),
    },
  );

  return toReport(identifier, outcome, attempts);
}

// ============================================================================
// Main Crawl Function
// ============================================================================

/**
 * Crawl the comics named by `plan` and return the run summary
 *
 * Only setup failures (output directory, latest lookup) throw; every
 * per-comic failure is recorded in the tracker and the run continues.
 */
export async function crawl(
  ctx: CrawlContext,
  plan: CrawlPlan,
): Promise<RunSummary> {
  const { config, tracker, logger } = ctx;
  const { maxDownloads, delay } = config.crawl;

  await prepareOutput(ctx);
  const { start, end } = await resolveRange(ctx, plan);
  ctx.onProgress?.({ type: "range-resolved", start, end });

  if (start > end) {
    logger.warn(`Nothing to crawl: start ${start} is past the end ${end}`);
  }

  const limitReached = (): boolean =>
    maxDownloads !== null && tracker.downloaded >= maxDownloads;

  for (let identifier = start; identifier <= end; identifier++) {
    if (limitReached()) {
      tracker.markStoppedEarly();
      logger.info(`Reached maximum of ${maxDownloads} downloads`);
      break;
    }

    ctx.onProgress?.({ type: "identifier-start", identifier });
    const report = await processIdentifier(ctx, identifier);
    tracker.record(report);
    ctx.onProgress?.({ type: "identifier-done", report });

    // Courtesy delay, only after a comic that hit the network
    const hasNext = identifier < end && !limitReached();
    if (report.status !== "skipped-existing" && hasNext && delay > 0) {
      await ctx.sleep(delay);
    }
  }

  return tracker.finish();
}
