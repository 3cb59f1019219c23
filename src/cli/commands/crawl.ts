/**
 * Crawl command - Loads config, builds the crawl context and runs the crawler
 */

import ora from "ora";
import { ZodError } from "zod";
import * as modules from "../../modules";
import { createComicSource, HttpImageSource } from "../../sources";
import { ComicStore } from "../../storage/comic-store";
import type { CrawlContext } from "../../types";
import {
  CrawlSetupError,
  HttpClient,
  Logger,
  Tracker,
  loadConfig,
  sleep,
} from "../../utils";
import { applyOptions, CrawlOptionsSchema, planFromOptions } from "../options";
import { createProgressReporter } from "../progress";

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("; ");
  }
  return error instanceof Error ? error.message : String(error);
}

export async function crawlCommand(opts: unknown): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = CrawlOptionsSchema.parse(opts);

    // Load configuration (default → user → custom), then CLI overrides
    const { config: loaded, errors } = await loadConfig(options.config);
    const config = applyOptions(loaded, options);
    const logger = new Logger(config.logging.level);

    if (errors.length > 0) {
      spinner.stop();
      for (const err of errors) {
        logger.warn(`Ignoring config ${err.path}: ${describeError(err.error)}`);
      }
    }

    const client = new HttpClient({
      userAgent: config.source.userAgent,
      timeout: config.source.timeout,
    });

    const ctx: CrawlContext = {
      config,
      logger,
      tracker: new Tracker(),
      source: createComicSource(config.source, client, logger),
      images: new HttpImageSource(client),
      store: new ComicStore(config.output),
      sleep,
      onProgress: config.logging.showProgress
        ? createProgressReporter(spinner)
        : undefined,
    };

    const plan = planFromOptions(options);
    spinner.start(
      plan.mode === "latest" ? "Looking up the latest comic..." : "Preparing output directory...",
    );

    await modules.crawl(ctx, plan);

    spinner.stop();
    await modules.stats(ctx);
  } catch (error) {
    if (error instanceof CrawlSetupError || error instanceof ZodError) {
      spinner.fail(describeError(error));
    } else {
      spinner.fail("Crawl failed");
      console.error(error);
    }
    process.exit(1);
  }
}
