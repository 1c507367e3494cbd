/**
 * Product-related types
 */

export type Currency = "RON" | "USD" | "EUR";

/** One rendered listing page as persisted in the sources directory */
export interface PageCapture {
  sourceUrl: string;
  fileName: string;
  rawBytes: Buffer;
}

/** Air conditioning unit as listed by the storefront */
export interface ProductRecord {
  name: string;
  manufacturer: string;

  /** Keys the export file; two records with the same code overwrite each other */
  productCode: string;
  /** Dedicated product page (details page) */
  productUrl: string;

  resellerProductPageUrl: string;
  manufacturerProductPageUrl: string;

  listingImagePath: string;
  listingImageUrl: string;

  price: number;
  currency: Currency;

  hasWifiConnection: boolean;
  mainsVoltage: string;
  /** Main dimension used to decide if the unit fits a mounting place */
  internalUnitLength: string;

  heatingNoiseLevel: string;
  coolingNoiseLevel: string;

  heatingEnergyClass: string;
  coolingEnergyClass: string;

  heatingBtuCapacity: string;
  coolingBtuCapacity: string;

  /**
   * Category → Subcategory 1 → Subcategory 2 → ...
   * e.g. ["Residential", "AC", "Split system"]
   */
  categoryDrillDown: string[];
}

/** Keys of ProductRecord whose values are plain text */
export type TextField = {
  [K in keyof ProductRecord]: string extends ProductRecord[K]
    ? ProductRecord[K] extends string
      ? K
      : never
    : never;
}[keyof ProductRecord];

export function emptyProductRecord(currency: Currency = "RON"): ProductRecord {
  return {
    name: "",
    manufacturer: "",
    productCode: "",
    productUrl: "",
    resellerProductPageUrl: "",
    manufacturerProductPageUrl: "",
    listingImagePath: "",
    listingImageUrl: "",
    price: 0,
    currency,
    hasWifiConnection: false,
    mainsVoltage: "",
    internalUnitLength: "",
    heatingNoiseLevel: "",
    coolingNoiseLevel: "",
    heatingEnergyClass: "",
    coolingEnergyClass: "",
    heatingBtuCapacity: "",
    coolingBtuCapacity: "",
    categoryDrillDown: [],
  };
}

/** Summary of one pipeline run */
export interface RunSummary {
  startedAt: string; // ISO
  finishedAt: string; // ISO
  site: string;
  pagesVisited: number;
  pagesCaptured: number;
  pagesSkipped: number;
  filesSkipped: number;
  products: number;
  exportsWritten: number;
}
