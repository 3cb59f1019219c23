/**
 * Progress output: one persisted spinner line per comic
 */

import type { Ora } from "ora";
import type { CrawlEvent } from "../types";
import { formatIdentifier } from "../utils/comic-filename";

function label(identifier: number): string {
  return `#${formatIdentifier(identifier)}`;
}

export function createProgressReporter(
  spinner: Ora,
): (event: CrawlEvent) => void {
  return (event) => {
    switch (event.type) {
      case "range-resolved":
        spinner.info(`Comics ${event.start} to ${event.end}`);
        break;
      case "identifier-start":
        spinner.start(`${label(event.identifier)} fetching...`);
        break;
      case "retry":
        spinner.text = `${label(event.identifier)} attempt ${event.attempt} failed (${event.cause.message}), retrying in ${event.delay}ms`;
        break;
      case "identifier-done": {
        const { report } = event;
        const prefix = label(report.identifier);
        switch (report.status) {
          case "downloaded":
            spinner.succeed(`${prefix} ${report.filename ?? "downloaded"}`);
            break;
          case "skipped-existing":
            spinner.info(`${prefix} already saved`);
            break;
          case "skipped-missing":
            spinner.warn(`${prefix} not found`);
            break;
          case "skipped-unavailable":
            spinner.warn(`${prefix} skipped: ${report.detail ?? "unavailable"}`);
            break;
          case "failed":
            spinner.fail(`${prefix} failed: ${report.detail ?? "unknown error"}`);
            break;
        }
        break;
      }
    }
  };
}
