/**
 * Typed reads from an opaque settings payload
 */

import type { ProviderSettings } from './types';

/**
 * String value of a setting, or undefined when absent or not a string
 */
export function readStringSetting(
  settings: ProviderSettings | undefined,
  key: string
): string | undefined {
  const value = settings?.[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Like readStringSetting, but treats an empty or whitespace-only string as absent
 */
export function readNonEmptySetting(
  settings: ProviderSettings | undefined,
  key: string
): string | undefined {
  const value = readStringSetting(settings, key)?.trim();
  return value ? value : undefined;
}
