/**
 * Crawl modules export
 */

export { crawl } from "./crawler";
export { stats } from "./stats";
