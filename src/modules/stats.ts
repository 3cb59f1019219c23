/**
 * Stats Module
 * Exports the run summary and displays it
 */

import chalk from "chalk";
import type { CrawlContext, RunSummary } from "../types";
import { formatIdentifier } from "../utils/comic-filename";

const MAX_LISTED_ISSUES = 10;

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

/**
 * Compact identifier list for a re-run hint, e.g. "3, 7-9, 12"
 */
export function formatIdentifierList(identifiers: readonly number[]): string {
  const sorted = [...identifiers].sort((a, b) => a - b);
  const parts: string[] = [];

  let index = 0;
  while (index < sorted.length) {
    const runStart = sorted[index];
    let runEnd = runStart;
    while (index + 1 < sorted.length && sorted[index + 1] === runEnd + 1) {
      index++;
      runEnd = sorted[index];
    }
    parts.push(runStart === runEnd ? `${runStart}` : `${runStart}-${runEnd}`);
    index++;
  }

  return parts.join(", ");
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export the summary to crawl-summary.json and display it
 */
export async function stats(ctx: CrawlContext): Promise<void> {
  const { tracker, store, logger, config } = ctx;
  const summary = tracker.finish();
  const verbose = config.logging.level === "debug";

  try {
    await tracker.exportSummary(store.outputDir);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Could not write run summary: ${message}`);
  }

  console.log("");

  const hasErrors = summary.failed > 0;
  const hasWarnings = summary.skippedMissing > 0 || summary.skippedUnavailable > 0;
  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Crawl Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayComicsSection(summary, config.crawl.maxDownloads);
  displayIssuesSection(summary, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayComicsSection(summary: RunSummary, maxDownloads: number | null): void {
  const total =
    summary.downloaded +
    summary.skippedExisting +
    summary.skippedMissing +
    summary.skippedUnavailable +
    summary.failed;

  console.log(sectionHeader("Comics"));
  console.log(`   ${progressBar(summary.downloaded + summary.skippedExisting, total)}`);

  console.log(statRow(chalk.green("◉"), "Downloaded", summary.downloaded, chalk.green));

  if (summary.skippedExisting > 0) {
    console.log(statRow(chalk.cyan("◉"), "Already saved", summary.skippedExisting, chalk.cyan));
  }

  if (summary.skippedMissing > 0) {
    console.log(
      statRow(
        chalk.yellow("◉"),
        "Not found",
        formatIdentifierList(summary.missingIdentifiers),
        chalk.yellow,
      ),
    );
  }

  if (summary.skippedUnavailable > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Unavailable", summary.skippedUnavailable, chalk.yellow),
    );
  }

  if (summary.failed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.failed, chalk.red));
  }

  if (summary.stoppedEarly && maxDownloads !== null) {
    console.log(
      statRow(chalk.dim("◉"), "Stopped", `after ${maxDownloads} downloads`, chalk.dim),
    );
  }
}

function displayIssuesSection(summary: RunSummary, verbose: boolean): void {
  if (summary.issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Issues")));

  const listed = verbose ? summary.issues : summary.issues.slice(0, MAX_LISTED_ISSUES);
  for (const issue of listed) {
    const color = issue.status === "failed" ? chalk.red : chalk.yellow;
    console.log(`      ${chalk.dim("·")} ${color(`#${formatIdentifier(issue.identifier)}`)} ${chalk.dim(issue.detail)}`);
  }
  if (listed.length < summary.issues.length) {
    console.log(`      ${chalk.dim(`  +${summary.issues.length - listed.length} more`)}`);
  }

  if (summary.failedIdentifiers.length > 0) {
    console.log(
      `\n   ${chalk.dim("Re-run the same command to retry:")} ${formatIdentifierList(summary.failedIdentifiers)}`,
    );
  }
}
