import type { ComicRecord } from "../types";
import { comicImageFilename, imageExtension } from "./comic-filename";

export interface ComicFields {
  identifier: number;
  title: string;
  altText: string;
  imageUrl: string;
  published?: string;
}

/**
 * Build a ComicRecord, deriving its extension and local filename
 */
export function createComicRecord(fields: ComicFields): ComicRecord {
  const extension = imageExtension(fields.imageUrl);
  const record: ComicRecord = {
    identifier: fields.identifier,
    title: fields.title,
    altText: fields.altText,
    imageUrl: fields.imageUrl,
    extension,
    filename: comicImageFilename(fields.identifier, fields.title, extension),
  };
  if (fields.published) {
    record.published = fields.published;
  }
  return record;
}
