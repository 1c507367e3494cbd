// src/core/export/template-mapper.ts
import { stringify } from "csv-stringify/sync";
import { promises as fs } from "fs";
import path from "node:path";
import { IoError } from "../errors/index";
import { PATH_SEPARATOR_TOKEN } from "../naming/page-namer";
import { assertDirectory } from "../storage/page-store";
import type { ExportProfile } from "../types/config";
import type { ProductRecord } from "../types/product";
import { Logger } from "../utils/logger";
import { buildDescription } from "./description";
import { EXPORT_COLUMNS, emptyExportRecord, type ExportRecord } from "./schema";

const orNull = (s: string): string | null => {
  const t = s.trim();
  return t === "" ? null : t;
};

/**
 * `<productCode>.csv`, with path separators escaped so the file always lands
 * directly in the export directory. An empty code gives `.csv`.
 */
export function exportFileName(productCode: string): string {
  return `${productCode.replace(/[\/\\]/g, PATH_SEPARATOR_TOKEN)}.csv`;
}

/** Lowercase, ASCII-only, dash-separated handle */
export function slugify(s: string): string {
  return s
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function buildTags(record: ProductRecord, productType: string): string {
  return [
    productType,
    record.manufacturer.trim(),
    record.coolingBtuCapacity,
    record.coolingEnergyClass,
    record.hasWifiConnection ? "WiFi" : "",
  ]
    .filter(Boolean)
    .join(", ");
}

/**
 * Maps a product onto the catalog import schema
 */
export function toExportRecord(
  record: ProductRecord,
  profile: ExportProfile,
): ExportRecord {
  const title = orNull(record.name);
  const productType = record.categoryDrillDown.at(-1) ?? profile.productType;

  return {
    ...emptyExportRecord(),
    handle: orNull(slugify(record.productCode || record.name)),
    title,
    bodyHtml: buildDescription(record, profile),
    vendor: orNull(record.manufacturer),
    type: productType,
    tags: orNull(buildTags(record, productType)),
    published: "TRUE",
    option1Name: "Title",
    option1Value: "Default Title",
    variantSku: orNull(record.productCode),
    variantGrams: "0",
    variantInventoryTracker: "shopify",
    variantInventoryQty: "0",
    variantInventoryPolicy: "deny",
    variantFulfillmentService: "manual",
    variantPrice: "0",
    variantRequiresShipping: "TRUE",
    variantTaxable: "TRUE",
    imageSrc: orNull(record.listingImageUrl),
    imagePosition: "1",
    imageAltText: title,
    giftCard: "FALSE",
    seoTitle: title,
    seoDescription: title,
    googleProductCategory: profile.googleProductCategory,
    googleMpn: orNull(record.productCode),
    googleCondition: "new",
    googleCustomProduct: "FALSE",
    variantWeightUnit: "kg",
  };
}

/** Header line plus one data line, columns in schema order */
export function serializeExportRecord(row: ExportRecord): string {
  return stringify([row], {
    header: true,
    columns: EXPORT_COLUMNS.map(({ key, header }) => ({ key, header })),
  });
}

/**
 * Writes one CSV file per product into the export directory
 */
export class TemplateMapper {
  constructor(private readonly profile: ExportProfile) {}

  /**
   * Writes `<productCode>.csv` under `exportRoot`, replacing an earlier file
   * with the same code
   * @returns path of the written file
   * @throws IoError if `exportRoot` is not a directory or the write fails
   */
  async toExport(record: ProductRecord, exportRoot: string): Promise<string> {
    await assertDirectory(exportRoot);

    const file = path.join(exportRoot, exportFileName(record.productCode));
    const csv = serializeExportRecord(toExportRecord(record, this.profile));
    try {
      await fs.writeFile(file, csv, "utf8");
    } catch (e) {
      throw new IoError(`Failed to write ${file}`, "write-failed", file, e);
    }
    Logger.exportWritten(record.productCode, file);
    return file;
  }
}
