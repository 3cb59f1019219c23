/**
 * Run Tracker
 * Tallies per-comic results into the run summary and exports it as JSON
 */

import { writeFile } from "fs/promises";
import { join } from "path";

export type IdentifierStatus =
  | "downloaded"
  | "skipped-existing"
  | "skipped-missing"
  | "skipped-unavailable"
  | "failed";

export interface IdentifierReport {
  identifier: number;
  status: IdentifierStatus;
  attempts: number; // 0 when the comic was already on disk
  filename?: string;
  detail?: string;
}

export interface RunIssue {
  identifier: number;
  status: "failed" | "skipped-unavailable";
  detail: string;
}

export interface RunSummary {
  readonly downloaded: number;
  readonly skippedExisting: number;
  readonly skippedMissing: number;
  readonly skippedUnavailable: number;
  readonly failed: number;
  readonly failedIdentifiers: readonly number[];
  readonly missingIdentifiers: readonly number[];
  readonly unavailableIdentifiers: readonly number[];
  readonly issues: readonly RunIssue[];
  readonly stoppedEarly: boolean;
  readonly duration: number; // In milliseconds
}

export const SUMMARY_FILENAME = "crawl-summary.json";

export class Tracker {
  private downloadedCount = 0;
  private skippedExisting = 0;
  private failedIdentifiers: number[] = [];
  private missingIdentifiers: number[] = [];
  private unavailableIdentifiers: number[] = [];
  private issues: RunIssue[] = [];
  private stoppedEarly = false;
  private readonly startTime: number;
  private summary: RunSummary | null = null;

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  get downloaded(): number {
    return this.downloadedCount;
  }

  get finished(): boolean {
    return this.summary !== null;
  }

  record(report: IdentifierReport): void {
    if (this.summary) {
      throw new Error(`Run already finished; cannot record comic ${report.identifier}`);
    }

    switch (report.status) {
      case "downloaded":
        this.downloadedCount++;
        break;
      case "skipped-existing":
        this.skippedExisting++;
        break;
      case "skipped-missing":
        this.missingIdentifiers.push(report.identifier);
        break;
      case "skipped-unavailable":
        this.unavailableIdentifiers.push(report.identifier);
        this.issues.push({
          identifier: report.identifier,
          status: report.status,
          detail: report.detail ?? "Unavailable",
        });
        break;
      case "failed":
        this.failedIdentifiers.push(report.identifier);
        this.issues.push({
          identifier: report.identifier,
          status: report.status,
          detail: report.detail ?? "Unknown error",
        });
        break;
    }
  }

  markStoppedEarly(): void {
    this.stoppedEarly = true;
  }

  /**
   * Close the run and return its summary
   * The summary is frozen; later calls return the same object.
   */
  finish(): RunSummary {
    if (!this.summary) {
      this.summary = Object.freeze({
        downloaded: this.downloadedCount,
        skippedExisting: this.skippedExisting,
        skippedMissing: this.missingIdentifiers.length,
        skippedUnavailable: this.unavailableIdentifiers.length,
        failed: this.failedIdentifiers.length,
        failedIdentifiers: Object.freeze([...this.failedIdentifiers]),
        missingIdentifiers: Object.freeze([...this.missingIdentifiers]),
        unavailableIdentifiers: Object.freeze([...this.unavailableIdentifiers]),
        issues: Object.freeze(this.issues.map((issue) => Object.freeze({ ...issue }))),
        stoppedEarly: this.stoppedEarly,
        duration: this.now() - this.startTime,
      });
    }
    return this.summary;
  }

  /**
   * Write the summary to `crawl-summary.json` in the output directory
   */
  async exportSummary(outputDir: string): Promise<string> {
    const summary = this.finish();
    const outputPath = join(outputDir, SUMMARY_FILENAME);
    await writeFile(outputPath, JSON.stringify(summary, null, 2) + "\n", "utf-8");
    return outputPath;
  }
}
