/**
 * Error types for the crawl, extraction and export phases
 */

/** Bad start URL or invalid directory layout. Raised before any work starts. */
export class ConfigurationError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The browser session could not reach or render a page. Ends the crawl. */
export class NavigationError extends Error {
  constructor(
    message: string,
    public url: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "NavigationError";
  }
}

/** A next-page link was found but its target is unusable. Ends the crawl. */
export class PaginationError extends Error {
  constructor(
    message: string,
    public pageUrl: string,
    public href: string | null,
  ) {
    super(message);
    this.name = "PaginationError";
  }
}

export type NamingFailure = "invalid-url" | "opaque-origin";

/** A URL could not be turned into a capture file name. */
export class NamingError extends Error {
  constructor(
    message: string,
    public reason: NamingFailure,
    public url: string,
  ) {
    super(message);
    this.name = "NamingError";
  }
}

/** A capture file could not be parsed into a document. */
export class ParseError extends Error {
  constructor(
    message: string,
    public file: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "ParseError";
  }
}

export type IoFailure = "not-a-directory" | "read-failed" | "write-failed";

export class IoError extends Error {
  constructor(
    message: string,
    public code: IoFailure,
    public path: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "IoError";
  }
}
