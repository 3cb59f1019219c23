import type { ComicRecord, ImageOutcome, ImageSource } from "../types";
import type { HttpClient } from "../utils/http-client";
import { malformedOutcome, requestFailureOutcome } from "./outcomes";

/**
 * Downloads comic image bytes over HTTP
 */
export class HttpImageSource implements ImageSource {
  constructor(private readonly client: HttpClient) {}

  async fetch(record: ComicRecord): Promise<ImageOutcome> {
    let bytes: Uint8Array;
    try {
      bytes = await this.client.getBytes(record.imageUrl);
    } catch (error) {
      const outcome = requestFailureOutcome(record.identifier, error);
      // The comic exists but its image does not; retrying will not help
      if (outcome.type === "not-found") {
        return {
          type: "permanent-skip",
          identifier: record.identifier,
          reason: `Image not found: ${record.imageUrl}`,
        };
      }
      return outcome;
    }

    if (bytes.byteLength === 0) {
      return malformedOutcome(record.identifier, `Empty image body: ${record.imageUrl}`);
    }

    return { type: "image", bytes };
  }
}
