import "dotenv/config";
import { promises as fs } from "fs";
import { AppConfig } from "./core/config/index";
import { runSite } from "./core/execution/runner";
import { Logger } from "./core/utils/logger";
import { getAdapter, getSiteKeys } from "./sites/registry";

async function main() {
  const argv = process.argv.slice(2);

  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  if (hasFlag("--help")) {
    Logger.info(`Usage:
npm run cli -- [--site <key>] [--start-url <url>] [--sources-dir <dir>] [--products-dir <dir>]
               [--skip-crawl] [--skip-export]

Options:
  --site          Storefront to run (default: SITE env or climatico)
  --start-url     First listing page (default: the storefront's listing)
  --sources-dir   Where page captures are stored (default: out/<site>/sources)
  --products-dir  Where export CSV files are written (default: out/<site>/product_info)
  --skip-crawl    Only extract and export pages already on disk
  --skip-export   Only crawl and store pages
  --list          List available storefronts

Available sites: ${getSiteKeys().join(", ")}`);
    process.exit(0);
  }

  if (hasFlag("--list")) {
    Logger.info(`Available sites: ${getSiteKeys().join(", ")}`);
    process.exit(0);
  }

  const siteKey = getArg("--site") || AppConfig.SITE;
  const adapter = getAdapter(siteKey);
  if (!adapter) {
    Logger.error(`❌ Unknown site: ${siteKey}`);
    Logger.info(`Available sites: ${getSiteKeys().join(", ")}`);
    process.exit(1);
  }

  const sourcesDir = getArg("--sources-dir") || AppConfig.sourcesDirFor(adapter.key);
  const productsDir = getArg("--products-dir") || AppConfig.productsDirFor(adapter.key);

  Logger.info("Creating output directory structure, if it's missing", {
    sourcesDir,
    productsDir,
  });
  await fs.mkdir(sourcesDir, { recursive: true });
  await fs.mkdir(productsDir, { recursive: true });

  try {
    await runSite(adapter, {
      sourcesDir,
      productsDir,
      startUrl: getArg("--start-url") || AppConfig.START_URL || undefined,
      skipCrawl: hasFlag("--skip-crawl"),
      skipExport: hasFlag("--skip-export"),
    });
  } catch (error) {
    Logger.error(`❌ Run failed for ${adapter.key}`, error);
    process.exit(1);
  }
}

main().catch((e) => {
  Logger.error("Fatal error", e);
  process.exit(1);
});
