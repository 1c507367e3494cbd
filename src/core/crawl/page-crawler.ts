/**
 * Pagination crawler
 */

import type { BrowserSession } from "../browser/session";
import { NamingError, PaginationError } from "../errors/index";
import { nameFor } from "../naming/page-namer";
import type { PageStore } from "../storage/page-store";
import type { PageCapture } from "../types/product";
import { Logger } from "../utils/logger";
import { parseStartUrl } from "../validation/config-validator";

export interface PageCrawlerOptions {
  session: BrowserSession;
  store: PageStore;
  /** Head-level link to the next listing page, e.g. `head > link[rel=next]` */
  nextPageSelector: string;
  /** Used in log lines only */
  site?: string;
}

export interface CrawlSummary {
  pagesVisited: number;
  captures: PageCapture[];
  /** Pages that were visited but could not be named, so were not saved */
  skipped: string[];
}

/**
 * Walks a listing's pagination chain with one browser session, saving every
 * rendered page to the store. Pages are visited strictly in order.
 *
 * There is no page limit and no cycle detection: a listing whose last page
 * links back to an earlier one is crawled forever.
 */
export class PageCrawler {
  private readonly session: BrowserSession;
  private readonly store: PageStore;
  private readonly nextPageSelector: string;
  private readonly site: string;

  constructor(options: PageCrawlerOptions) {
    this.session = options.session;
    this.store = options.store;
    this.nextPageSelector = options.nextPageSelector;
    this.site = options.site ?? "";
  }

  /**
   * @throws ConfigurationError if `startUrl` cannot be parsed (nothing is fetched)
   * @throws NavigationError if a page cannot be reached; earlier captures stay on disk
   * @throws PaginationError if a next-page link has no usable target
   */
  async crawl(startUrl: string): Promise<CrawlSummary> {
    let pageUrl = parseStartUrl(startUrl);
    const summary: CrawlSummary = { pagesVisited: 0, captures: [], skipped: [] };

    Logger.info(`Saving page sources starting with ${pageUrl.href}`, {
      site: this.site,
    });

    for (;;) {
      Logger.debug(`Navigating to ${pageUrl.href}`, { site: this.site });
      await this.session.navigate(pageUrl.href);
      summary.pagesVisited++;

      const capture = await this.capture(pageUrl);
      if (capture) summary.captures.push(capture);
      else summary.skipped.push(pageUrl.href);

      const next = await this.nextPage(pageUrl);
      if (!next) {
        Logger.info("No more pages left", {
          site: this.site,
          count: summary.pagesVisited,
        });
        return summary;
      }
      pageUrl = next;
    }
  }

  private async capture(pageUrl: URL): Promise<PageCapture | null> {
    const source = await this.session.currentSource();

    let fileName: string;
    try {
      fileName = nameFor(pageUrl);
    } catch (e) {
      if (!(e instanceof NamingError)) throw e;
      Logger.error(`Could not determine file name to save page ${pageUrl.href}`, e, {
        site: this.site,
        url: pageUrl.href,
      });
      return null;
    }

    const capture: PageCapture = {
      sourceUrl: pageUrl.href,
      fileName,
      rawBytes: Buffer.from(source, "utf8"),
    };
    const file = await this.store.write(capture);
    Logger.pageCaptured(this.site, pageUrl.href, file);
    return capture;
  }

  private async nextPage(pageUrl: URL): Promise<URL | null> {
    const link = await this.session.findSingle(this.nextPageSelector);
    if (!link) return null;

    const href = await link.getAttribute("href");
    if (href === null) {
      throw new PaginationError(
        `Next page link on ${pageUrl.href} has no href`,
        pageUrl.href,
        href,
      );
    }
    try {
      return new URL(href, pageUrl);
    } catch {
      throw new PaginationError(
        `Failed to parse next page link "${href}" on ${pageUrl.href}`,
        pageUrl.href,
        href,
      );
    }
  }
}
