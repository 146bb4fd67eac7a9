/**
 * Concurrent remote tree crawler
 *
 * @packageDocumentation
 */

export { type Channel, createChannel, type ReceiveResult } from "./channel.ts";
export {
  type CrawlJob,
  type CrawlOptions,
  type CrawlResult,
  createTreeCrawler,
  DEFAULT_CONCURRENCY,
  DEFAULT_QUEUE_CAPACITY,
  MAX_CONCURRENCY,
  type ProgressCallback,
  type TreeCrawler,
  type TreeCrawlerConfig,
} from "./crawler.ts";
