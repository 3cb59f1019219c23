/**
 * Source adapter contracts
 * Implementations convert every expected condition into outcome data.
 */

import type { ComicRecord } from "./comic";
import type { FetchOutcome, ImageOutcome, LatestOutcome } from "./outcome";

export interface ComicSource {
  readonly name: string;
  /** Fetch one comic's metadata by identifier */
  fetch(identifier: number): Promise<FetchOutcome>;
  /** Look up the identifier of the most recent comic */
  latest(): Promise<LatestOutcome>;
}

export interface ImageSource {
  fetch(record: ComicRecord): Promise<ImageOutcome>;
}
