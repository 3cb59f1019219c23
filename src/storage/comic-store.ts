/**
 * Comic Store
 * Stateless facade over the output directory. An image plus its metadata
 * record form the artifact pair for one comic; the metadata record is written
 * last and is the only resumption signal.
 */

import { mkdir, readdir, readFile, rm } from "fs/promises";
import { basename, join } from "node:path";
import {
  ComicMetadataSchema,
  type ComicMetadata,
  type ComicRecord,
  type SaveOutcome,
} from "../types";
import { classifyPersistenceError } from "../utils/classify-error";
import { comicMetadataFilename } from "../utils/comic-filename";
import { fileHasContent } from "../utils/file-exists";
import { TEMP_FILE_PATTERN, writeFileAtomic } from "../utils/write-file-atomic";

/**
 * Convert a record to the on-disk metadata shape
 */
export function toComicMetadata(record: ComicRecord): ComicMetadata {
  const metadata: ComicMetadata = {
    identifier: record.identifier,
    title: record.title,
    alt_text: record.altText,
    image_url: record.imageUrl,
    filename: record.filename,
  };
  if (record.published) {
    metadata.published = record.published;
  }
  return metadata;
}

export class ComicStore {
  constructor(readonly outputDir: string) {}

  metadataPath(identifier: number): string {
    return join(this.outputDir, comicMetadataFilename(identifier));
  }

  imagePath(filename: string): string {
    return join(this.outputDir, filename);
  }

  /**
   * Create the output directory and remove temporary files left behind by
   * an interrupted run. Errors propagate: the run cannot start without it.
   */
  async prepare(): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });

    const entries = await readdir(this.outputDir);
    for (const entry of entries) {
      if (TEMP_FILE_PATTERN.test(entry)) {
        await rm(join(this.outputDir, entry), { force: true });
      }
    }
  }

  /**
   * Read the metadata record for a comic
   * Returns null when it is missing, unreadable, truncated or for another comic.
   */
  async load(identifier: number): Promise<ComicMetadata | null> {
    let content: string;
    try {
      content = await readFile(this.metadataPath(identifier), "utf-8");
    } catch {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      return null;
    }

    const result = ComicMetadataSchema.safeParse(parsed);
    if (!result.success || result.data.identifier !== identifier) {
      return null;
    }
    return result.data;
  }

  /**
   * True when a valid metadata record exists and the image it names is a
   * non-empty file in the output directory
   */
  async exists(identifier: number): Promise<boolean> {
    const metadata = await this.load(identifier);
    if (!metadata || basename(metadata.filename) !== metadata.filename) {
      return false;
    }
    return fileHasContent(this.imagePath(metadata.filename));
  }

  /**
   * Write the image, then the metadata record
   */
  async save(record: ComicRecord, image: Uint8Array): Promise<SaveOutcome> {
    if (image.byteLength === 0) {
      return {
        type: "failed",
        cause: {
          kind: "malformed",
          message: `Refusing to save an empty image for comic ${record.identifier}`,
          retryable: true,
        },
      };
    }

    const imagePath = this.imagePath(record.filename);
    const metadataPath = this.metadataPath(record.identifier);

    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFileAtomic(imagePath, image);
      await writeFileAtomic(
        metadataPath,
        JSON.stringify(toComicMetadata(record), null, 2) + "\n",
      );
    } catch (error) {
      return { type: "failed", cause: classifyPersistenceError(error) };
    }

    return { type: "saved", imagePath, metadataPath };
  }
}
