import type { DocumentMetadata, MetadataValue } from '../../interfaces/chunk.interface.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) return undefined;
  const entry = value[key];
  return typeof entry === 'string' ? entry : undefined;
}

export function readNumber(value: unknown, key: string): number | undefined {
  if (!isRecord(value)) return undefined;
  const entry = value[key];
  return typeof entry === 'number' ? entry : undefined;
}

/**
 * Walk nested records by key; undefined as soon as a level is missing
 */
export function readPath(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function isMetadataValue(value: unknown): value is MetadataValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isMetadataValue);
  }
  return isRecord(value) && Object.values(value).every(isMetadataValue);
}

/**
 * Metadata read back from a backend; entries that are not JSON values are dropped
 */
export function toMetadata(value: unknown): DocumentMetadata {
  const metadata: DocumentMetadata = {};
  if (!isRecord(value)) {
    return metadata;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (isMetadataValue(entry)) {
      metadata[key] = entry;
    }
  }
  return metadata;
}
