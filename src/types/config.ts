/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const SourceConfigSchema = z.object({
  baseUrl: z.url(),
  userAgent: z.string(),
  timeout: z.number().int().positive(), // In milliseconds
  // Scrape the comic page when the JSON endpoint is unreachable or malformed
  fallback: z.boolean(),
});

export const CrawlConfigSchema = z.object({
  delay: z.number().nonnegative(), // In milliseconds, between fetched comics
  maxDownloads: z.number().int().positive().nullable(),
});

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().positive(),
  baseDelay: z.number().nonnegative(), // In milliseconds, doubled per attempt
  maxDelay: z.number().nonnegative(), // In milliseconds
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
  showProgress: z.boolean(),
});

export const CrawlerConfigSchema = z.object({
  output: z.string().min(1),
  source: SourceConfigSchema,
  crawl: CrawlConfigSchema,
  retry: RetryConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialCrawlerConfigSchema = CrawlerConfigSchema.partial().extend({
  source: SourceConfigSchema.partial().optional(),
  crawl: CrawlConfigSchema.partial().optional(),
  retry: RetryConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type CrawlConfig = z.infer<typeof CrawlConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type CrawlerConfig = z.infer<typeof CrawlerConfigSchema>;
export type PartialCrawlerConfig = z.infer<typeof PartialCrawlerConfigSchema>;
