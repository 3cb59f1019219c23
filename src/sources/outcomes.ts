/**
 * Shared conversion from request errors and scraped fields to outcomes
 */

import type {
  FetchOutcome,
  NotFoundOutcome,
  PermanentSkipOutcome,
  TransientFailureOutcome,
} from "../types";
import { classifyRequestError } from "../utils/classify-error";
import { createComicRecord, type ComicFields } from "../utils/create-comic-record";
import { HttpError } from "../utils/errors";

export type FailureOutcome =
  | NotFoundOutcome
  | TransientFailureOutcome
  | PermanentSkipOutcome;

/**
 * Convert an error thrown while requesting a comic into an outcome
 * 404 is a definitive not-found; non-retryable HTTP errors are permanent skips.
 */
export function requestFailureOutcome(
  identifier: number,
  error: unknown,
): FailureOutcome {
  if (error instanceof HttpError && error.status === 404) {
    return { type: "not-found", identifier };
  }

  const cause = classifyRequestError(error);
  if (!cause.retryable) {
    return { type: "permanent-skip", identifier, reason: cause.message };
  }
  return { type: "transient-failure", identifier, cause };
}

export function malformedOutcome(
  identifier: number,
  message: string,
): TransientFailureOutcome {
  return {
    type: "transient-failure",
    identifier,
    cause: { kind: "malformed", message, retryable: true },
  };
}

/**
 * Validate the image URL of scraped fields and build a success outcome
 * Comics that publish no image file (interactive ones) are permanent skips.
 */
export function comicOutcome(fields: ComicFields): FetchOutcome {
  let imageUrl: URL;
  try {
    imageUrl = new URL(fields.imageUrl);
  } catch {
    return malformedOutcome(
      fields.identifier,
      `Invalid image URL: ${fields.imageUrl}`,
    );
  }

  if (imageUrl.protocol !== "http:" && imageUrl.protocol !== "https:") {
    return malformedOutcome(
      fields.identifier,
      `Unsupported image URL: ${fields.imageUrl}`,
    );
  }

  if (imageUrl.pathname.endsWith("/")) {
    return {
      type: "permanent-skip",
      identifier: fields.identifier,
      reason: `No image file published (${imageUrl.href})`,
    };
  }

  return {
    type: "success",
    record: createComicRecord({ ...fields, imageUrl: imageUrl.href }),
  };
}
