import type { StringMap } from '../types.js';

/**
 * `"all"` in any letter case selects the cluster-wide list call
 */
export function isAllNamespaces(namespace: string): boolean {
  return namespace.toLowerCase() === 'all';
}

/**
 * ISO-8601 text for an API timestamp, null when the server sent none
 */
export function formatTimestamp(value: Date | string | undefined | null): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  return value ? value : null;
}

/**
 * Bracketed list used in error messages, e.g. `[app, sidecar]`
 */
export function formatNameList(names: string[]): string {
  return `[${names.join(', ')}]`;
}

export function copyStringMap(map: { [key: string]: string } | undefined): StringMap {
  return map ? { ...map } : {};
}

export function orNull<T>(value: T | undefined | null): T | null {
  return value ?? null;
}
