import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createComicRecord } from "../utils/create-comic-record";
import { ComicStore, toComicMetadata } from "./comic-store";

const record = createComicRecord({
  identifier: 1,
  title: "Barrel - Part 1",
  altText: "Don't we all.",
  imageUrl: "https://imgs.xkcd.test/comics/barrel_cropped_(1).jpg",
  published: "2006-01-01",
});

const imageBytes = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

describe("ComicStore", () => {
  let dir: string;
  let store: ComicStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "comic-store-"));
    store = new ComicStore(join(dir, "comics"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("saves the image and the metadata record", async () => {
    const outcome = await store.save(record, imageBytes);

    expect(outcome).toEqual({
      type: "saved",
      imagePath: join(dir, "comics", "0001_Barrel_-_Part_1.jpg"),
      metadataPath: join(dir, "comics", "0001_metadata.json"),
    });
    expect(Array.from(await readFile(join(dir, "comics", "0001_Barrel_-_Part_1.jpg")))).toEqual(
      Array.from(imageBytes),
    );

    const metadata = JSON.parse(await readFile(join(dir, "comics", "0001_metadata.json"), "utf-8"));
    expect(metadata).toEqual({
      identifier: 1,
      title: "Barrel - Part 1",
      alt_text: "Don't we all.",
      image_url: "https://imgs.xkcd.test/comics/barrel_cropped_(1).jpg",
      filename: "0001_Barrel_-_Part_1.jpg",
      published: "2006-01-01",
    });
  });

  it("leaves no temporary files behind", async () => {
    await store.save(record, imageBytes);

    expect((await readdir(store.outputDir)).sort()).toEqual([
      "0001_Barrel_-_Part_1.jpg",
      "0001_metadata.json",
    ]);
  });

  it("reports saved comics as existing", async () => {
    expect(await store.exists(1)).toBe(false);
    await store.save(record, imageBytes);

    expect(await store.exists(1)).toBe(true);
    expect(await store.load(1)).toEqual(toComicMetadata(record));
  });

  it("saves a comic with a long multi-byte title", async () => {
    const longTitle = createComicRecord({
      identifier: 7,
      title: "漫".repeat(120),
      altText: "",
      imageUrl: "https://imgs.xkcd.test/comics/manga.png",
    });

    const outcome = await store.save(longTitle, imageBytes);

    expect(outcome).toEqual({
      type: "saved",
      imagePath: join(dir, "comics", `0007_${"漫".repeat(66)}.png`),
      metadataPath: join(dir, "comics", "0007_metadata.json"),
    });
    expect(await store.exists(7)).toBe(true);
  });

  it("refuses to save an empty image", async () => {
    const outcome = await store.save(record, new Uint8Array());

    expect(outcome).toEqual({
      type: "failed",
      cause: {
        kind: "malformed",
        message: "Refusing to save an empty image for comic 1",
        retryable: true,
      },
    });
    expect(await store.exists(1)).toBe(false);
  });

  describe("exists", () => {
    beforeEach(async () => {
      await store.save(record, imageBytes);
    });

    it("is false when the image is empty", async () => {
      await writeFile(store.imagePath(record.filename), "");
      expect(await store.exists(1)).toBe(false);
    });

    it("is false when the image is missing", async () => {
      await rm(store.imagePath(record.filename));
      expect(await store.exists(1)).toBe(false);
    });

    it("is false when the metadata is truncated", async () => {
      await writeFile(store.metadataPath(1), '{"identifier": 1, "tit');
      expect(await store.exists(1)).toBe(false);
      expect(await store.load(1)).toBeNull();
    });

    it("is false when the metadata names another comic", async () => {
      await writeFile(
        store.metadataPath(1),
        JSON.stringify({ ...toComicMetadata(record), identifier: 2 }),
      );
      expect(await store.exists(1)).toBe(false);
    });

    it("is false when the metadata points outside the output directory", async () => {
      await writeFile(join(dir, "outside.jpg"), "bytes");
      await writeFile(
        store.metadataPath(1),
        JSON.stringify({ ...toComicMetadata(record), filename: "../outside.jpg" }),
      );
      expect(await store.exists(1)).toBe(false);
    });
  });

  it("prepare creates the directory and removes stale temporary files", async () => {
    await store.prepare();
    await writeFile(join(store.outputDir, "0002_metadata.json.1234.tmp"), "partial");
    await writeFile(join(store.outputDir, "notes.txt"), "keep");

    await store.prepare();

    expect(await readdir(store.outputDir)).toEqual(["notes.txt"]);
  });

  it("classifies write failures as persistence errors", async () => {
    // A file where the output directory should be
    await writeFile(join(dir, "blocked"), "");
    const blocked = new ComicStore(join(dir, "blocked"));

    const outcome = await blocked.save(record, imageBytes);

    expect(outcome.type).toBe("failed");
    if (outcome.type !== "failed") return;
    expect(outcome.cause.kind).toBe("persistence");
    expect(await blocked.exists(1)).toBe(false);
  });
});
