import { EntityKind, EntityMetadata } from '../../types/entity.types';

/**
 * Metadata predicates applied in SQL before ranking. `city` and the
 * coordinate ranges only exist on airports.
 */
export interface SearchFilters {
  country?: string;
  city?: string;
  style?: string;
  tag?: string;
  hasImage?: boolean;
  minLatitude?: number;
  maxLatitude?: number;
  minLongitude?: number;
  maxLongitude?: number;
}

/** One weighted cosine-distance term of the ranking score. */
export interface DistanceTerm {
  vector: number[];
  weight: number;
}

export interface VectorSearchQuery {
  kind: EntityKind;
  // score = sum(weight * cosine_distance(embedding, vector))
  terms: DistanceTerm[];
  keywords: string[];
  filters: SearchFilters;
  limit: number;
}

export interface SearchHit {
  id: number;
  kind: EntityKind;
  name: string;
  city: string | null;
  country: string | null;
  iata: string | null;
  icao: string | null;
  url: string | null;
  metadata: EntityMetadata | null;
  distance: number;
  keywordHits: number;
}

export interface UpsertCounts {
  inserted: number;
  updated: number;
}
