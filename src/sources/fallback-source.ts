/**
 * Fallback source
 * Uses the primary source and consults the fallback only when the primary
 * reports a transient failure. Not-found and permanent skips are final.
 */

import type { ComicSource, FetchOutcome, LatestOutcome } from "../types";
import type { Logger } from "../utils/logger";

export class FallbackComicSource implements ComicSource {
  readonly name: string;

  constructor(
    private readonly primary: ComicSource,
    private readonly fallback: ComicSource,
    private readonly logger: Logger,
  ) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  async fetch(identifier: number): Promise<FetchOutcome> {
    const outcome = await this.primary.fetch(identifier);
    if (outcome.type !== "transient-failure") {
      return outcome;
    }

    this.logger.debug(
      `Comic ${identifier}: ${this.primary.name} source failed (${outcome.cause.message}), trying ${this.fallback.name} source`,
    );
    return this.fallback.fetch(identifier);
  }

  async latest(): Promise<LatestOutcome> {
    const outcome = await this.primary.latest();
    if (outcome.type === "latest") {
      return outcome;
    }

    this.logger.debug(
      `Latest comic: ${this.primary.name} source failed (${outcome.cause.message}), trying ${this.fallback.name} source`,
    );
    return this.fallback.latest();
  }
}
