import { JsonObject } from '../types/index.js';

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walks `source` along a dot-separated path. Missing keys, null values and
 * walking into a non-object all yield `defaultValue`.
 */
export function getNestedValue(source: unknown, dotPath: string, defaultValue: unknown = undefined): unknown {
  let current: unknown = source;
  for (const key of dotPath.split('.')) {
    if (!isRecord(current) || !(key in current)) {
      return defaultValue;
    }
    current = current[key];
  }
  return current === null || current === undefined ? defaultValue : current;
}
