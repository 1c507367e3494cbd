/**
 * Browser launching and configuration
 */

import { chromium, type Browser } from "playwright";
import { AppConfig } from "../config/app-config";

/**
 * Launches a Chromium browser instance
 * @returns Promise resolving to the browser instance
 */
export async function launchBrowser(): Promise<Browser> {
  return await chromium.launch({
    headless: AppConfig.HEADLESS,
    args: ["--disable-dev-shm-usage", "--no-sandbox"],
  });
}
