#!/usr/bin/env tsx

/**
 * CLI entry point for the comic crawler
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { crawlCommand } from "./commands/crawl";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("comic-crawler")
  .description("Download webcomic images and metadata, resuming where the last run stopped")
  .version("0.1.0");

// Main crawl command (default action)
program
  .option("-s, --start <n>", "First comic to fetch (default: 1)")
  .option("-e, --end <n>", "Last comic to fetch (default: latest)")
  .option("--single <n>", "Fetch a single comic")
  .option("-m, --max <n>", "Stop after this many downloads")
  .option("-o, --output <path>", "Output directory for images and metadata")
  .option("-d, --delay <seconds>", "Delay between requests in seconds")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--no-fallback", "Do not scrape comic pages when the JSON endpoint fails")
  .option("-v, --verbose", "Verbose output")
  .action(crawlCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
