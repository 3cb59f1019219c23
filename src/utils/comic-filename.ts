/**
 * Filename derivation for persisted comics
 */

import path from "node:path";
import { sanitizeTitle } from "./sanitize-title";

export const DEFAULT_IMAGE_EXTENSION = ".png";
export const METADATA_EXTENSION = ".json";

const IDENTIFIER_WIDTH = 4;

/**
 * Zero-pad an identifier for use as a filename prefix
 *
 * @example
 * formatIdentifier(1) // "0001"
 * formatIdentifier(12345) // "12345"
 */
export function formatIdentifier(identifier: number): string {
  return String(identifier).padStart(IDENTIFIER_WIDTH, "0");
}

/**
 * Derive the image extension from the path of an image URL
 * Falls back to ".png" when the URL has no usable suffix.
 *
 * @example
 * imageExtension("https://imgs.xkcd.com/comics/barrel_cropped_(1).jpg") // ".jpg"
 * imageExtension("https://example.com/image") // ".png"
 */
export function imageExtension(imageUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(imageUrl).pathname;
  } catch {
    return DEFAULT_IMAGE_EXTENSION;
  }

  const extension = path.posix.extname(pathname);
  return /^\.[a-z0-9]{1,5}$/i.test(extension)
    ? extension.toLowerCase()
    : DEFAULT_IMAGE_EXTENSION;
}

export function comicImageFilename(
  identifier: number,
  title: string,
  extension: string,
): string {
  return `${formatIdentifier(identifier)}_${sanitizeTitle(title)}${extension}`;
}

export function comicMetadataFilename(identifier: number): string {
  return `${formatIdentifier(identifier)}_metadata${METADATA_EXTENSION}`;
}
