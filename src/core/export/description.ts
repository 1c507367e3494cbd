/**
 * Generated product description (Body HTML column)
 */

import type { ExportProfile } from "../types/config";
import type { ProductRecord } from "../types/product";

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (s: string): string =>
  s.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);

const row = (label: string, value: string) =>
  `<tr><td>${escapeHtml(label)}</td><td>${escapeHtml(value)}</td></tr>`;

/**
 * Two-column HTML table with the unit's main characteristics, the WiFi flag
 * as yes/no and the category breadcrumb
 */
export function buildDescription(record: ProductRecord, profile: ExportProfile): string {
  const l = profile.descriptionLabels;
  const rows = [
    row(l.coolingBtuCapacity, record.coolingBtuCapacity),
    row(l.heatingBtuCapacity, record.heatingBtuCapacity),
    row(l.coolingEnergyClass, record.coolingEnergyClass),
    row(l.heatingEnergyClass, record.heatingEnergyClass),
    row(l.coolingNoiseLevel, record.coolingNoiseLevel),
    row(l.heatingNoiseLevel, record.heatingNoiseLevel),
    row(l.wifi, record.hasWifiConnection ? l.yes : l.no),
    row(l.category, record.categoryDrillDown.join(profile.categorySeparator)),
  ];
  return `<table>${rows.join("")}</table>`;
}
