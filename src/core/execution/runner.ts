/**
 * Main execution runner
 */

import { performance } from "node:perf_hooks";
import {
  PlaywrightSession,
  withBrowserSession,
  type SessionFactory,
} from "../browser/session";
import { PageCrawler } from "../crawl/page-crawler";
import { TemplateMapper } from "../export/template-mapper";
import { ProductExtractor } from "../extraction/product-extractor";
import { PageStore } from "../storage/page-store";
import type { StorefrontAdapter } from "../types/config";
import type { RunSummary } from "../types/product";
import { formatDuration } from "../utils/date";
import { Logger } from "../utils/logger";
import {
  assertDistinctRoots,
  parseStartUrl,
} from "../validation/config-validator";

/**
 * Configuration options for one storefront run
 */
export interface RunnerOptions {
  sourcesDir: string;
  productsDir: string;
  /** Defaults to the adapter's start URL */
  startUrl?: string;
  /** Re-mine pages already on disk instead of crawling */
  skipCrawl?: boolean;
  /** Stop after crawling */
  skipExport?: boolean;
  /** Defaults to a Playwright Chromium session */
  openSession?: SessionFactory;
}

/**
 * Crawls the listing, extracts every product from the stored pages and
 * writes one export file per product
 * @throws ConfigurationError before any work if the options are invalid
 */
export async function runSite(
  adapter: StorefrontAdapter,
  options: RunnerOptions,
): Promise<RunSummary> {
  const t0 = performance.now();
  const startedAt = new Date().toISOString();
  const site = adapter.key;
  const startUrl = options.startUrl ?? adapter.startUrl;

  // pre-flight
  assertDistinctRoots(options.sourcesDir, options.productsDir);
  parseStartUrl(startUrl);

  const summary: RunSummary = {
    startedAt,
    finishedAt: startedAt,
    site,
    pagesVisited: 0,
    pagesCaptured: 0,
    pagesSkipped: 0,
    filesSkipped: 0,
    products: 0,
    exportsWritten: 0,
  };

  if (!options.skipCrawl) {
    const store = new PageStore(options.sourcesDir);
    const open = options.openSession ?? (() => PlaywrightSession.open());
    const crawl = await withBrowserSession(open, (session) =>
      new PageCrawler({
        session,
        store,
        nextPageSelector: adapter.nextPageSelector,
        site,
      }).crawl(startUrl),
    );
    summary.pagesVisited = crawl.pagesVisited;
    summary.pagesCaptured = crawl.captures.length;
    summary.pagesSkipped = crawl.skipped.length;
    Logger.crawlComplete(site, crawl.pagesVisited, (performance.now() - t0) / 1000);
  }

  if (!options.skipExport) {
    const extractor = new ProductExtractor({
      adapter,
      sourcesDir: options.sourcesDir,
      productsDir: options.productsDir,
    });
    const { records, skippedFiles } = await extractor.extract();
    summary.products = records.length;
    summary.filesSkipped = skippedFiles.length;

    const mapper = new TemplateMapper(adapter.exportProfile);
    for (const record of records) {
      await mapper.toExport(record, options.productsDir);
      summary.exportsWritten++;
    }
  }

  summary.finishedAt = new Date().toISOString();
  const elapsed = (performance.now() - t0) / 1000;
  Logger.info(
    `done site=${site} pages=${summary.pagesCaptured} products=${summary.products} wrote=${summary.exportsWritten} elapsed=${formatDuration(elapsed)}`,
    { ...summary },
  );
  return summary;
}
