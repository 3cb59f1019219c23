/**
 * HTTP Client
 * Thin wrapper over fetch() with a user agent, a per-request timeout and
 * HttpError for non-2xx responses. It never retries; see withRetry().
 */

import { HttpError } from "./errors";

export interface HttpClientOptions {
  userAgent: string;
  timeout: number; // In milliseconds, covers the whole request including the body
}

export class HttpClient {
  constructor(private readonly options: HttpClientOptions) {}

  async getJson(url: string): Promise<unknown> {
    return this.get(url, async (response) => {
      const body: unknown = await response.json();
      return body;
    });
  }

  async getText(url: string): Promise<string> {
    return this.get(url, (response) => response.text());
  }

  async getBytes(url: string): Promise<Uint8Array> {
    return this.get(
      url,
      async (response) => new Uint8Array(await response.arrayBuffer()),
    );
  }

  private async get<T>(
    url: string,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: { "User-Agent": this.options.userAgent },
      });

      if (!response.ok) {
        // Release the connection; the error body is never read
        await response.body?.cancel();
        throw new HttpError(url, response.status, response.statusText);
      }

      return await read(response);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
