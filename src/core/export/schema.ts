/**
 * Catalog import schema
 *
 * One row per product. The column set and order are fixed; a column with no
 * value is written as an empty cell, never left out.
 */

export interface ExportRecord {
  handle: string | null;
  title: string | null;
  bodyHtml: string | null;
  vendor: string | null;
  type: string | null;
  tags: string | null;
  published: string | null;
  option1Name: string | null;
  option1Value: string | null;
  option2Name: string | null;
  option2Value: string | null;
  option3Name: string | null;
  option3Value: string | null;
  variantSku: string | null;
  variantGrams: string | null;
  variantInventoryTracker: string | null;
  variantInventoryQty: string | null;
  variantInventoryPolicy: string | null;
  variantFulfillmentService: string | null;
  variantPrice: string | null;
  variantCompareAtPrice: string | null;
  variantRequiresShipping: string | null;
  variantTaxable: string | null;
  variantBarcode: string | null;
  imageSrc: string | null;
  imagePosition: string | null;
  imageAltText: string | null;
  giftCard: string | null;
  seoTitle: string | null;
  seoDescription: string | null;
  googleProductCategory: string | null;
  googleGender: string | null;
  googleAgeGroup: string | null;
  googleMpn: string | null;
  googleAdWordsGrouping: string | null;
  googleAdWordsLabels: string | null;
  googleCondition: string | null;
  googleCustomProduct: string | null;
  googleCustomLabel0: string | null;
  googleCustomLabel1: string | null;
  googleCustomLabel2: string | null;
  googleCustomLabel3: string | null;
  googleCustomLabel4: string | null;
  variantImage: string | null;
  variantWeightUnit: string | null;
  variantTaxCode: string | null;
  costPerItem: string | null;
}

export type ExportColumn = keyof ExportRecord;

/** Record key and CSV header of every column, in output order */
export const EXPORT_COLUMNS: ReadonlyArray<{ key: ExportColumn; header: string }> = [
  { key: "handle", header: "Handle" },
  { key: "title", header: "Title" },
  { key: "bodyHtml", header: "Body (HTML)" },
  { key: "vendor", header: "Vendor" },
  { key: "type", header: "Type" },
  { key: "tags", header: "Tags" },
  { key: "published", header: "Published" },
  { key: "option1Name", header: "Option1 Name" },
  { key: "option1Value", header: "Option1 Value" },
  { key: "option2Name", header: "Option2 Name" },
  { key: "option2Value", header: "Option2 Value" },
  { key: "option3Name", header: "Option3 Name" },
  { key: "option3Value", header: "Option3 Value" },
  { key: "variantSku", header: "Variant SKU" },
  { key: "variantGrams", header: "Variant Grams" },
  { key: "variantInventoryTracker", header: "Variant Inventory Tracker" },
  { key: "variantInventoryQty", header: "Variant Inventory Qty" },
  { key: "variantInventoryPolicy", header: "Variant Inventory Policy" },
  { key: "variantFulfillmentService", header: "Variant Fulfillment Service" },
  { key: "variantPrice", header: "Variant Price" },
  { key: "variantCompareAtPrice", header: "Variant Compare At Price" },
  { key: "variantRequiresShipping", header: "Variant Requires Shipping" },
  { key: "variantTaxable", header: "Variant Taxable" },
  { key: "variantBarcode", header: "Variant Barcode" },
  { key: "imageSrc", header: "Image Src" },
  { key: "imagePosition", header: "Image Position" },
  { key: "imageAltText", header: "Image Alt Text" },
  { key: "giftCard", header: "Gift Card" },
  { key: "seoTitle", header: "SEO Title" },
  { key: "seoDescription", header: "SEO Description" },
  { key: "googleProductCategory", header: "Google Shopping / Google Product Category" },
  { key: "googleGender", header: "Google Shopping / Gender" },
  { key: "googleAgeGroup", header: "Google Shopping / Age Group" },
  { key: "googleMpn", header: "Google Shopping / MPN" },
  { key: "googleAdWordsGrouping", header: "Google Shopping / AdWords Grouping" },
  { key: "googleAdWordsLabels", header: "Google Shopping / AdWords Labels" },
  { key: "googleCondition", header: "Google Shopping / Condition" },
  { key: "googleCustomProduct", header: "Google Shopping / Custom Product" },
  { key: "googleCustomLabel0", header: "Google Shopping / Custom Label 0" },
  { key: "googleCustomLabel1", header: "Google Shopping / Custom Label 1" },
  { key: "googleCustomLabel2", header: "Google Shopping / Custom Label 2" },
  { key: "googleCustomLabel3", header: "Google Shopping / Custom Label 3" },
  { key: "googleCustomLabel4", header: "Google Shopping / Custom Label 4" },
  { key: "variantImage", header: "Variant Image" },
  { key: "variantWeightUnit", header: "Variant Weight Unit" },
  { key: "variantTaxCode", header: "Variant Tax Code" },
  { key: "costPerItem", header: "Cost per item" },
];

/** A record with every column empty */
export function emptyExportRecord(): ExportRecord {
  return {
    handle: null,
    title: null,
    bodyHtml: null,
    vendor: null,
    type: null,
    tags: null,
    published: null,
    option1Name: null,
    option1Value: null,
    option2Name: null,
    option2Value: null,
    option3Name: null,
    option3Value: null,
    variantSku: null,
    variantGrams: null,
    variantInventoryTracker: null,
    variantInventoryQty: null,
    variantInventoryPolicy: null,
    variantFulfillmentService: null,
    variantPrice: null,
    variantCompareAtPrice: null,
    variantRequiresShipping: null,
    variantTaxable: null,
    variantBarcode: null,
    imageSrc: null,
    imagePosition: null,
    imageAltText: null,
    giftCard: null,
    seoTitle: null,
    seoDescription: null,
    googleProductCategory: null,
    googleGender: null,
    googleAgeGroup: null,
    googleMpn: null,
    googleAdWordsGrouping: null,
    googleAdWordsLabels: null,
    googleCondition: null,
    googleCustomProduct: null,
    googleCustomLabel0: null,
    googleCustomLabel1: null,
    googleCustomLabel2: null,
    googleCustomLabel3: null,
    googleCustomLabel4: null,
    variantImage: null,
    variantWeightUnit: null,
    variantTaxCode: null,
    costPerItem: null,
  };
}
