/**
 * Structured JSON source
 * Reads `<base>/<id>/info.0.json` and the `<base>/info.0.json` latest alias
 */

import {
  ComicPayloadSchema,
  LatestPayloadSchema,
  type ComicPayload,
  type ComicSource,
  type FetchOutcome,
  type LatestOutcome,
} from "../types";
import { classifyRequestError } from "../utils/classify-error";
import type { HttpClient } from "../utils/http-client";
import { comicOutcome, malformedOutcome, requestFailureOutcome } from "./outcomes";

/**
 * Build a YYYY-MM-DD date from the payload's string date parts
 */
export function formatPublished(payload: ComicPayload): string | undefined {
  const { year, month, day } = payload;
  if (!year || !month || !day || !/^\d{4}$/.test(year)) {
    return undefined;
  }
  if (!/^\d{1,2}$/.test(month) || !/^\d{1,2}$/.test(day)) {
    return undefined;
  }
  return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
}

export class JsonComicSource implements ComicSource {
  readonly name = "json";
  private readonly baseUrl: string;

  constructor(
    private readonly client: HttpClient,
    baseUrl: string,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  comicUrl(identifier: number): string {
    return `${this.baseUrl}/${identifier}/info.0.json`;
  }

  latestUrl(): string {
    return `${this.baseUrl}/info.0.json`;
  }

  async fetch(identifier: number): Promise<FetchOutcome> {
    let payload: ComicPayload;
    try {
      const body = await this.client.getJson(this.comicUrl(identifier));
      payload = ComicPayloadSchema.parse(body);
    } catch (error) {
      return requestFailureOutcome(identifier, error);
    }

    if (payload.num !== identifier) {
      return malformedOutcome(
        identifier,
        `Expected comic ${identifier}, received comic ${payload.num}`,
      );
    }

    return comicOutcome({
      identifier,
      title: payload.safe_title || payload.title,
      altText: payload.alt,
      imageUrl: payload.img,
      published: formatPublished(payload),
    });
  }

  async latest(): Promise<LatestOutcome> {
    try {
      const body = await this.client.getJson(this.latestUrl());
      const { num } = LatestPayloadSchema.parse(body);
      return { type: "latest", identifier: num };
    } catch (error) {
      return { type: "unavailable", cause: classifyRequestError(error) };
    }
  }
}
