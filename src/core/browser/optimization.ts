/**
 * Browser optimization utilities
 */

import type { Page } from "playwright";

/**
 * Blocks images, fonts and stylesheets. Captures only need the markup, and
 * lazy-loaded image URLs are read from attributes, not from the network.
 * @param page - Playwright page instance to optimize
 */
export async function optimizePage(page: Page): Promise<void> {
  await page.route("**/*", (route) => {
    const t = route.request().resourceType();
    if (t === "image" || t === "font" || t === "stylesheet")
      return route.abort();
    return route.continue();
  });
}
