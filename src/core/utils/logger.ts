import pino from "pino";

// Set log level via env LOG_LEVEL (default: info)
const pretty =
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport: pretty
    ? {
        target: "pino-pretty",
        options: { colorize: true },
      }
    : undefined,
});

export interface LogMeta {
  site?: string;
  url?: string;
  file?: string;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    const err = error instanceof Error ? error : undefined;
    const errorMeta = {
      ...meta,
      error: err?.message ?? (error === undefined ? undefined : String(error)),
      stack: err?.stack,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static pageCaptured(site: string, url: string, file: string): void {
    this.info(`Page captured: ${url}`, { site, url, file });
  }
  static productExtracted(file: string, productName: string, productCode: string): void {
    this.debug(`Product extracted: ${productName}`, {
      file,
      productName,
      productCode,
    });
  }
  static crawlComplete(site: string, pages: number, duration: number): void {
    this.info(`Crawl complete`, { site, pages, duration });
  }
  static exportWritten(productCode: string, file: string): void {
    this.debug(`Export written: ${productCode}`, { productCode, file });
  }
}
