export const ENTITY_KINDS = ['airport', 'airline'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export type MetadataValue = string | number | boolean | string[];

/**
 * Free-form document stored in the `metadata` JSON column. Known keys are
 * `style`, `tags`, `license` and `attribution`; anything else passes through.
 */
export type EntityMetadata = Record<string, MetadataValue>;

export interface AirportRecord {
  id: number;
  name: string;
  city: string | null;
  country: string | null;
  iata: string | null;
  icao: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface AirlineRecord {
  id: number;
  name: string;
  alias: string | null;
  iata: string | null;
  icao: string | null;
  callsign: string | null;
  country: string | null;
  active: 'Y' | 'N' | null;
}

export interface EntityRecordMap {
  airport: AirportRecord;
  airline: AirlineRecord;
}

export type EntityRecord = AirportRecord | AirlineRecord;

export type EmbeddingSource = 'image' | 'text';

export interface EmbeddingRecord {
  id: number;
  source: EmbeddingSource;
  vector: number[];
}

/**
 * A row ready for the store: descriptive fields plus media URL, metadata and
 * vector. Upserts overwrite every field of an existing row.
 */
export type StoredEntity<K extends EntityKind = EntityKind> = EntityRecordMap[K] & {
  url: string | null;
  metadata: EntityMetadata | null;
  embedding: number[];
};

export function isEntityKind(value: unknown): value is EntityKind {
  return value === 'airport' || value === 'airline';
}

export function tableFor(kind: EntityKind): 'airports' | 'airlines' {
  return kind === 'airport' ? 'airports' : 'airlines';
}
