// Centralized storefront registry

import type { StorefrontAdapter } from "../core/types/index";
import { adapter as climatico } from "./climatico/adapter";

const adapters = {
  climatico,
} as const;

export type RegistryKey = keyof typeof adapters;

export function getSiteKeys(): RegistryKey[] {
  return Object.keys(adapters).filter(isSiteKey);
}

export function isSiteKey(key: string): key is RegistryKey {
  return Object.prototype.hasOwnProperty.call(adapters, key);
}

export function getAdapter(key: string): StorefrontAdapter | null {
  return isSiteKey(key) ? adapters[key] : null;
}
