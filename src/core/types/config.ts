/**
 * Configuration-related types
 */

import type { NodeSelector } from "../extraction/selector";
import type { Currency, ProductRecord } from "./product";

/** Writes one feature-table value onto a record */
export type FeatureSetter = (record: ProductRecord, value: string) => void;

/** Row labels in the storefront's feature table, mapped to record fields */
export type FeatureLabelMap = Readonly<Record<string, FeatureSetter>>;

/** Where product data lives inside a listing page */
export interface ListingSelectors {
  /** Repeated product item nodes, searched from the document root */
  productItems: NodeSelector;
  /** Listing image inside an item: alt text and lazy-load source */
  image: NodeSelector;
  /** Anchor to the product details page inside an item */
  detailLink: NodeSelector;
  /** Body of the feature table inside an item */
  featureTableBody: NodeSelector;
}

/** Row labels used in the generated HTML description */
export interface DescriptionLabels {
  coolingBtuCapacity: string;
  heatingBtuCapacity: string;
  coolingEnergyClass: string;
  heatingEnergyClass: string;
  coolingNoiseLevel: string;
  heatingNoiseLevel: string;
  wifi: string;
  category: string;
  yes: string;
  no: string;
}

/** Fixed values the catalog export takes from the storefront */
export interface ExportProfile {
  productType: string;
  googleProductCategory: string;
  categorySeparator: string;
  descriptionLabels: DescriptionLabels;
}

/** StorefrontAdapter – everything that is specific to one storefront */
export interface StorefrontAdapter {
  key: string;
  displayName: string;
  baseHost: string;

  /** First listing page */
  startUrl: string;

  /** Head-level link to the next listing page */
  nextPageSelector: string;

  selectors: ListingSelectors;

  /** Attribute names read from the listing image */
  imageAttributes: { name: string; url: string };

  featureLabels: FeatureLabelMap;

  defaults: { currency: Currency };

  exportProfile: ExportProfile;
}
