/**
 * Public entry point
 */

export * from "./core/index";
export { adapter as climatico } from "./sites/climatico/adapter";
export { getAdapter, getSiteKeys, type RegistryKey } from "./sites/registry";
