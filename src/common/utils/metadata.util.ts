import { EntityMetadata, MetadataValue } from '../../types/entity.types';

export interface MetadataFields {
  style?: string | null;
  tags?: string | null;
  license?: string | null;
  attribution?: string | null;
}

export function isMetadataValue(value: unknown): value is MetadataValue {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/** Split a comma-separated tag list; trimmed, de-duplicated and sorted. */
export function parseTags(raw: string | null | undefined): string[] {
  if (!raw) {
    return [];
  }
  const tags = raw
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
  return [...new Set(tags)].sort();
}

export function buildMetadata(fields: MetadataFields): EntityMetadata {
  const metadata: EntityMetadata = {};
  const style = fields.style?.trim();
  const tags = parseTags(fields.tags);
  const license = fields.license?.trim();
  const attribution = fields.attribution?.trim();

  if (style) {
    metadata.style = style;
  }
  if (tags.length > 0) {
    metadata.tags = tags;
  }
  if (license) {
    metadata.license = license;
  }
  if (attribution) {
    metadata.attribution = attribution;
  }
  return metadata;
}

/**
 * Keys whose values the metadata column does not accept. `tags`, when
 * present, must be a list of strings.
 */
export function invalidMetadataKeys(metadata: Record<string, unknown>): string[] {
  return Object.entries(metadata)
    .filter(([key, value]) =>
      key === 'tags' ? !Array.isArray(value) || !isMetadataValue(value) : !isMetadataValue(value),
    )
    .map(([key]) => key);
}

/**
 * Decode a metadata column as returned by the driver (JSON text, a buffer or
 * an already parsed object). Entries of unsupported types are dropped.
 */
export function decodeMetadata(value: unknown): EntityMetadata | null {
  let parsed: unknown = value;
  if (Buffer.isBuffer(parsed)) {
    parsed = parsed.toString('utf-8');
  }
  if (typeof parsed === 'string') {
    try {
      parsed = JSON.parse(parsed);
    } catch {
      return null;
    }
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const metadata: EntityMetadata = {};
  for (const [key, entry] of Object.entries(parsed)) {
    if (isMetadataValue(entry)) {
      metadata[key] = entry;
    }
  }
  return metadata;
}
