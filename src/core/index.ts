/**
 * Core module index - exports all core functionality
 */

// Errors
export * from "./errors/index";

// Naming & storage
export * from "./naming/page-namer";
export * from "./storage/page-store";

// Browser & crawl
export * from "./browser/session";
export * from "./crawl/page-crawler";

// Extraction
export * from "./extraction/selector";
export * from "./extraction/product-extractor";

// Export
export * from "./export/schema";
export * from "./export/description";
export * from "./export/template-mapper";

// Execution
export * from "./execution/runner";

// Config & validation
export * from "./config/index";
export * from "./validation/config-validator";

// Types
export * from "./types/index";
