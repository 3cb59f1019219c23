import { afterEach, describe, it, expect, vi } from "vitest";
import { createComicRecord } from "../utils/create-comic-record";
import { HttpClient } from "../utils/http-client";
import { HttpImageSource } from "./image-source";

const record = createComicRecord({
  identifier: 1,
  title: "Barrel - Part 1",
  altText: "",
  imageUrl: "https://imgs.xkcd.test/comics/barrel.jpg",
});

const images = new HttpImageSource(new HttpClient({ userAgent: "test-agent", timeout: 1000 }));

function stubResponse(response: () => Response) {
  vi.stubGlobal("fetch", vi.fn(async () => response()));
}

describe("HttpImageSource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the image bytes", async () => {
    stubResponse(() => new Response(new Uint8Array([1, 2, 3])));

    const outcome = await images.fetch(record);
    expect(outcome.type).toBe("image");
    if (outcome.type !== "image") return;
    expect(Array.from(outcome.bytes)).toEqual([1, 2, 3]);
  });

  it("skips a comic whose image is gone", async () => {
    stubResponse(() => new Response("", { status: 404, statusText: "Not Found" }));

    expect(await images.fetch(record)).toEqual({
      type: "permanent-skip",
      identifier: 1,
      reason: "Image not found: https://imgs.xkcd.test/comics/barrel.jpg",
    });
  });

  it("reports an empty body as malformed", async () => {
    stubResponse(() => new Response(new Uint8Array()));

    expect(await images.fetch(record)).toEqual({
      type: "transient-failure",
      identifier: 1,
      cause: {
        kind: "malformed",
        message: "Empty image body: https://imgs.xkcd.test/comics/barrel.jpg",
        retryable: true,
      },
    });
  });

  it("reports server errors as retryable", async () => {
    stubResponse(() => new Response("", { status: 500, statusText: "Internal Server Error" }));

    const outcome = await images.fetch(record);
    expect(outcome).toMatchObject({
      type: "transient-failure",
      cause: { kind: "server", status: 500, retryable: true },
    });
  });
});
