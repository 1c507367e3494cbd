// src/core/extraction/product-extractor.ts
import { load as loadHtml, type Cheerio, type CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import path from "node:path";
import { IoError, ParseError } from "../errors/index";
import { PageStore } from "../storage/page-store";
import type { StorefrontAdapter } from "../types/config";
import { emptyProductRecord, type ProductRecord } from "../types/product";
import { Logger } from "../utils/logger";
import { assertDistinctRoots } from "../validation/config-validator";
import { attributeOf, queryAll, queryFirst } from "./selector";

/** One label/value row of a product's feature table */
export interface FeatureRow {
  label: string;
  value: string;
}

export interface ExtractionResult {
  records: ProductRecord[];
  /** Capture files that could not be read or parsed */
  skippedFiles: string[];
}

/**
 * Label and value of every row in a feature table body. The label is the
 * first cell, the value the last; a row with a single cell has an empty value.
 */
export function readFeatureRows($: CheerioAPI, tableBody: Cheerio<Element>): FeatureRow[] {
  return tableBody
    .find("tr")
    .toArray()
    .map((tr) => {
      const cells = $(tr).children();
      const label = cells.first().text().trim();
      const value = cells.length > 1 ? cells.last().text().trim() : "";
      return { label, value };
    });
}

/**
 * Builds a record from one product item node. Every lookup takes the first
 * match only; anything not found leaves the field at its empty default.
 */
export function extractProductItem(
  $: CheerioAPI,
  item: Cheerio<Element>,
  adapter: StorefrontAdapter,
): ProductRecord {
  const record = emptyProductRecord(adapter.defaults.currency);
  const { selectors, imageAttributes, featureLabels } = adapter;

  const img = queryFirst(item, selectors.image);
  if (img) {
    record.name = attributeOf(img, imageAttributes.name) ?? record.name;
    record.listingImageUrl =
      attributeOf(img, imageAttributes.url) ?? record.listingImageUrl;
  }

  const link = queryFirst(item, selectors.detailLink);
  if (link) {
    record.productUrl = attributeOf(link, "href") ?? record.productUrl;
  }

  const tableBody = queryFirst(item, selectors.featureTableBody);
  if (!tableBody) {
    Logger.debug("No product features table body found", { productName: record.name });
    return record;
  }

  for (const { label, value } of readFeatureRows($, tableBody)) {
    const setter = Object.hasOwn(featureLabels, label) ? featureLabels[label] : undefined;
    setter?.(record, value);
  }
  return record;
}

/**
 * All products on one listing page, in document order
 * @throws ParseError if the markup cannot be loaded
 */
export function extractDocument(
  html: string,
  adapter: StorefrontAdapter,
  file = "<inline>",
): ProductRecord[] {
  let $: CheerioAPI;
  try {
    $ = loadHtml(html);
  } catch (e) {
    throw new ParseError(`Failed to parse ${file}`, file, e);
  }

  return queryAll($.root(), adapter.selectors.productItems)
    .toArray()
    .map((li) => {
      const record = extractProductItem($, $(li), adapter);
      Logger.productExtracted(file, record.name, record.productCode);
      return record;
    });
}

export interface ProductExtractorOptions {
  adapter: StorefrontAdapter;
  sourcesDir: string;
  /** Where export files go; must not be the sources directory */
  productsDir: string;
  /** Store to read captures from; defaults to a PageStore over `sourcesDir` */
  store?: PageStore;
}

/**
 * Mines stored listing pages for product records
 */
export class ProductExtractor {
  private readonly adapter: StorefrontAdapter;
  private readonly store: PageStore;
  private readonly productsDir: string;

  constructor(options: ProductExtractorOptions) {
    this.adapter = options.adapter;
    this.store = options.store ?? new PageStore(options.sourcesDir);
    this.productsDir = path.resolve(options.productsDir);
  }

  /**
   * Reads every stored capture. A file that cannot be read or parsed is
   * logged and skipped; the remaining files are still processed.
   *
   * @throws ConfigurationError if the sources and products directories are the same
   * @throws IoError("not-a-directory") if the sources directory is missing
   */
  async extract(): Promise<ExtractionResult> {
    assertDistinctRoots(this.store.rootDir, this.productsDir);
    const files = await this.store.list();

    const result: ExtractionResult = { records: [], skippedFiles: [] };
    for (const file of files) {
      Logger.info(`Extracting products from ${path.basename(file)}`, { file });
      try {
        const html = (await this.store.read(file)).toString("utf8");
        const records = extractDocument(html, this.adapter, file);
        result.records.push(...records);
        Logger.debug(`Found ${records.length} products`, { file, count: records.length });
      } catch (e) {
        if (!(e instanceof IoError) && !(e instanceof ParseError)) throw e;
        Logger.error(`Skipping capture ${file}`, e, { file });
        result.skippedFiles.push(file);
      }
    }
    return result;
  }
}
