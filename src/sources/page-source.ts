/**
 * HTML page source
 * Scrapes `<base>/<id>/` when the structured endpoint cannot be used
 */

import { load } from "cheerio";
import type { ComicSource, FetchOutcome, LatestOutcome } from "../types";
import { classifyRequestError } from "../utils/classify-error";
import type { HttpClient } from "../utils/http-client";
import { comicOutcome, malformedOutcome, requestFailureOutcome } from "./outcomes";

const PERMALINK_PATTERN = /\/(\d+)\/?$/;
const PERMALINK_TEXT_PATTERN = /Permanent link to this comic:\s*\S*?\/(\d+)\/?(?:\s|$)/;

export class PageComicSource implements ComicSource {
  readonly name = "page";
  private readonly baseUrl: string;

  constructor(
    private readonly client: HttpClient,
    baseUrl: string,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  pageUrl(identifier: number): string {
    return `${this.baseUrl}/${identifier}/`;
  }

  async fetch(identifier: number): Promise<FetchOutcome> {
    const pageUrl = this.pageUrl(identifier);

    let html: string;
    try {
      html = await this.client.getText(pageUrl);
    } catch (error) {
      return requestFailureOutcome(identifier, error);
    }

    const $ = load(html);
    const image = $("#comic img").first();
    const src = image.attr("src")?.trim();
    if (!src) {
      return malformedOutcome(identifier, `No comic image found in ${pageUrl}`);
    }

    let imageUrl: string;
    try {
      // Image sources are usually protocol-relative ("//imgs.example.com/...")
      imageUrl = new URL(src, pageUrl).href;
    } catch {
      return malformedOutcome(identifier, `Invalid image reference: ${src}`);
    }

    const title = $("#ctitle").first().text().trim() || (image.attr("alt") ?? "").trim();

    return comicOutcome({
      identifier,
      title,
      altText: image.attr("title") ?? "",
      imageUrl,
    });
  }

  async latest(): Promise<LatestOutcome> {
    let html: string;
    try {
      html = await this.client.getText(`${this.baseUrl}/`);
    } catch (error) {
      return { type: "unavailable", cause: classifyRequestError(error) };
    }

    const $ = load(html);
    const permalink = $('meta[property="og:url"]').attr("content") ?? "";
    const match =
      permalink.match(PERMALINK_PATTERN) ??
      $("body").text().match(PERMALINK_TEXT_PATTERN);

    if (!match) {
      return {
        type: "unavailable",
        cause: {
          kind: "malformed",
          message: "No permalink to the latest comic found on the home page",
          retryable: true,
        },
      };
    }

    return { type: "latest", identifier: Number.parseInt(match[1], 10) };
  }
}
