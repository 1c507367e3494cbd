/**
 * Centralized application configuration
 */

import { envBool, envInt, envStr } from "./env";

export class AppConfig {
  // Storefront
  static readonly SITE = envStr("SITE", "climatico");
  static readonly START_URL = envStr("START_URL", "");

  // Output configuration
  static readonly OUT_DIR_BASE = envStr("OUT_DIR_BASE", "out");
  static readonly SOURCES_DIR = envStr("SOURCES_DIR", "");
  static readonly PRODUCTS_DIR = envStr("PRODUCTS_DIR", "");

  // Browser configuration
  static readonly HEADLESS = envBool("HEADLESS", true);
  static readonly NAV_TIMEOUT_MS = envInt("NAV_TIMEOUT_MS", 30000);
  static readonly BLOCK_RESOURCES = envBool("BLOCK_RESOURCES", true);

  /** Page captures go here unless SOURCES_DIR is set */
  static sourcesDirFor(site: string): string {
    return this.SOURCES_DIR || `${this.OUT_DIR_BASE}/${site}/sources`;
  }

  /** Export files go here unless PRODUCTS_DIR is set */
  static productsDirFor(site: string): string {
    return this.PRODUCTS_DIR || `${this.OUT_DIR_BASE}/${site}/product_info`;
  }
}
