import type { DriveClient } from "@dirscope/client";
import { createTreeCrawler } from "@dirscope/crawler";
import type { Entry } from "@dirscope/protocol";
import ora from "ora";
import { unwrap } from "./errors";
import { type OutputFormatter, truncateName } from "./output";
import type { StartPoint } from "./resolve";

/**
 * Crawl everything below `start` with a spinner on stderr.
 * Throws on failure, like every command helper.
 */
export async function crawlWithProgress(
  client: DriveClient,
  start: StartPoint,
  options: { workers: number; formatter: OutputFormatter; signal?: AbortSignal }
): Promise<Entry[]> {
  const { workers, formatter, signal } = options;
  const crawler = createTreeCrawler({
    listChildren: client.entries.listChildren,
    concurrency: workers,
    logger: formatter,
  });

  const spinner = ora({
    text: `Scanning: ${truncateName(start.name, 40)}`,
    isSilent: formatter.isQuiet || formatter.isVerbose,
  }).start();

  const result = await crawler.crawl(start.id, start.name, {
    signal,
    onProgress: (dirName, total) => {
      spinner.text = `Scanning: ${truncateName(dirName, 40)} (${total} entries found)`;
    },
  });

  if (result.ok) {
    spinner.succeed(`Scanned ${start.name}: ${result.data.length} entries`);
  } else {
    spinner.fail(`Scan of ${start.name} failed`);
  }
  return unwrap(result);
}
