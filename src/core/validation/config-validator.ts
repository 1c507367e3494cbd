/**
 * Pre-flight validation of a run's configuration
 */

import path from "node:path";
import { ConfigurationError } from "../errors/index";

/**
 * Parses the first listing page URL
 * @throws ConfigurationError if the URL cannot be parsed
 */
export function parseStartUrl(raw: string): URL {
  try {
    return new URL(raw);
  } catch {
    throw new ConfigurationError(
      `Start URL is not a valid URL: "${raw}"`,
      "startUrl",
    );
  }
}

/**
 * Page captures and export files must live in different directories, or the
 * extractor would read its own output
 * @throws ConfigurationError if both resolve to the same path
 */
export function assertDistinctRoots(sourcesDir: string, productsDir: string): void {
  if (path.resolve(sourcesDir) === path.resolve(productsDir)) {
    throw new ConfigurationError(
      `Sources and products directories must differ, both are ${path.resolve(sourcesDir)}`,
      "productsDir",
    );
  }
}
