import { describe, it, expect, vi } from "vitest";
import type { ComicSource, FetchOutcome, LatestOutcome } from "../types";
import { createComicRecord } from "../utils/create-comic-record";
import { Logger } from "../utils/logger";
import { FallbackComicSource } from "./fallback-source";

function fakeSource(name: string, outcome: FetchOutcome, latest: LatestOutcome) {
  return {
    name,
    fetch: vi.fn(async (): Promise<FetchOutcome> => outcome),
    latest: vi.fn(async (): Promise<LatestOutcome> => latest),
  } satisfies ComicSource;
}

const success: FetchOutcome = {
  type: "success",
  record: createComicRecord({
    identifier: 1,
    title: "Barrel - Part 1",
    altText: "",
    imageUrl: "https://imgs.xkcd.test/comics/barrel.jpg",
  }),
};

const transient: FetchOutcome = {
  type: "transient-failure",
  identifier: 1,
  cause: { kind: "server", message: "HTTP 502: Bad Gateway", retryable: true, status: 502 },
};

const unavailable: LatestOutcome = {
  type: "unavailable",
  cause: { kind: "network", message: "Request timed out", retryable: true, code: "ETIMEDOUT" },
};

const logger = new Logger("silent");

describe("FallbackComicSource", () => {
  it("is named after both sources", () => {
    const source = new FallbackComicSource(
      fakeSource("json", success, unavailable),
      fakeSource("page", success, unavailable),
      logger,
    );
    expect(source.name).toBe("json+page");
  });

  it("uses the fallback after a transient failure", async () => {
    const primary = fakeSource("json", transient, unavailable);
    const fallback = fakeSource("page", success, unavailable);
    const source = new FallbackComicSource(primary, fallback, logger);

    expect(await source.fetch(1)).toBe(success);
    expect(fallback.fetch).toHaveBeenCalledWith(1);
  });

  it("treats not-found and permanent skips from the primary as final", async () => {
    for (const outcome of [
      { type: "not-found", identifier: 1 },
      { type: "permanent-skip", identifier: 1, reason: "HTTP 403: Forbidden" },
    ] satisfies FetchOutcome[]) {
      const fallback = fakeSource("page", success, unavailable);
      const source = new FallbackComicSource(fakeSource("json", outcome, unavailable), fallback, logger);

      expect(await source.fetch(1)).toBe(outcome);
      expect(fallback.fetch).not.toHaveBeenCalled();
    }
  });

  it("returns the fallback's failure when both fail", async () => {
    const pageFailure: FetchOutcome = {
      type: "transient-failure",
      identifier: 1,
      cause: { kind: "malformed", message: "No comic image found", retryable: true },
    };
    const source = new FallbackComicSource(
      fakeSource("json", transient, unavailable),
      fakeSource("page", pageFailure, unavailable),
      logger,
    );

    expect(await source.fetch(1)).toBe(pageFailure);
  });

  it("asks the fallback for the latest comic only when the primary cannot say", async () => {
    const latest: LatestOutcome = { type: "latest", identifier: 2500 };
    const primary = fakeSource("json", success, latest);
    const fallback = fakeSource("page", success, { type: "latest", identifier: 2499 });

    expect(await new FallbackComicSource(primary, fallback, logger).latest()).toBe(latest);
    expect(fallback.latest).not.toHaveBeenCalled();

    const failing = fakeSource("json", success, unavailable);
    expect(await new FallbackComicSource(failing, fallback, logger).latest()).toEqual({
      type: "latest",
      identifier: 2499,
    });
  });
});
