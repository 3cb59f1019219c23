/**
 * Comic type definitions
 */

import { z } from "zod";

/**
 * A comic as fetched from the source, with its local filename already derived.
 * `filename` is a pure function of identifier, title and extension.
 */
export interface ComicRecord {
  identifier: number;
  title: string; // May be empty
  altText: string; // May be empty
  imageUrl: string; // Absolute URL
  extension: string; // Including the dot, e.g. ".png"
  filename: string; // e.g. "0001_Barrel_-_Part_1.jpg"
  published?: string; // YYYY-MM-DD, when the source reports a date
}

/**
 * Metadata record persisted beside each image.
 * Field names are part of the on-disk format; keep them stable.
 */
export const ComicMetadataSchema = z.object({
  identifier: z.number().int().positive(),
  title: z.string(),
  alt_text: z.string(),
  image_url: z.string(),
  filename: z.string().min(1),
  published: z.string().optional(),
});

export type ComicMetadata = z.infer<typeof ComicMetadataSchema>;

/**
 * Body of the structured JSON endpoint (`/<id>/info.0.json`)
 */
export const ComicPayloadSchema = z.object({
  num: z.number().int().positive(),
  title: z.string(),
  safe_title: z.string().optional(),
  alt: z.string(),
  img: z.string().min(1),
  year: z.string().optional(),
  month: z.string().optional(),
  day: z.string().optional(),
});

export type ComicPayload = z.infer<typeof ComicPayloadSchema>;

/**
 * Body of the "latest" alias (`/info.0.json`); only the identifier matters
 */
export const LatestPayloadSchema = z.object({
  num: z.number().int().positive(),
});
