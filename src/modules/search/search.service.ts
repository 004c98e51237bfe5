import { Injectable, Logger } from '@nestjs/common';
import { EmbeddingError, QueryError } from '../../common/errors/skyvision.errors';
import { MAX_UPLOAD_BYTES } from '../../common/utils/image.util';
import { EntityKind, EntityMetadata } from '../../types/entity.types';
import { DistanceTerm, SearchFilters, SearchHit } from '../catalog/catalog.types';
import { EntityStore } from '../catalog/entity-store';
import { extractKeywords } from '../catalog/keywords';
import { EmbeddingService } from '../embedding/embedding.service';

export const DEFAULT_TOP_K = 10;
export const MAX_TOP_K = 1000;
export const DEFAULT_HYBRID_WEIGHT = 0.5;

export interface SearchOptions {
  k?: number;
  kind?: EntityKind;
  filters?: SearchFilters;
}

export interface HybridSearchOptions extends SearchOptions {
  image?: Uint8Array | null;
  // share of the text distance in the blended score
  weight?: number;
}

export interface SearchResultItem {
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
}

export interface SearchResult {
  count: number;
  // true when a hybrid query fell back to text-only ranking
  degraded: boolean;
  hits: SearchResultItem[];
}

const AIRPORT_ONLY_FILTERS = [
  'city',
  'minLatitude',
  'maxLatitude',
  'minLongitude',
  'maxLongitude',
] as const;

/**
 * Text, image and hybrid nearest-neighbour search. Each request embeds its
 * own query with the shared model; nothing is kept between requests.
 */
@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);

  constructor(
    private readonly embeddingService: EmbeddingService,
    private readonly store: EntityStore,
  ) {}

  async searchText(query: string, options: SearchOptions = {}): Promise<SearchResult> {
    const text = (query ?? '').trim();
    if (!text) {
      throw new QueryError('Query text must not be empty');
    }
    const { kind, k, filters } = this.resolve(options, 'airport');
    this.logger.log(`text search kind=${kind} k=${k} filters=${describeFilters(filters)}`);

    const vector = await this.embeddingService.embedText(text);
    return this.rank(kind, k, filters, [{ vector, weight: 1 }], extractKeywords(text), false);
  }

  async searchImage(image: Uint8Array, options: SearchOptions = {}): Promise<SearchResult> {
    if (!image || image.length === 0) {
      throw new QueryError('An image is required');
    }
    const { kind, k, filters } = this.resolve(options, 'airline');
    this.logger.log(
      `image search kind=${kind} k=${k} bytes=${image.length} filters=${describeFilters(filters)}`,
    );

    const vector = await this.embedQueryImage(image);
    return this.rank(kind, k, filters, [{ vector, weight: 1 }], [], false);
  }

  /**
   * Rank by `weight * text_distance + (1 - weight) * image_distance`. A weight
   * of 1 is exactly the text search and 0 exactly the image search. When the
   * image cannot be embedded the text ranking is returned, flagged degraded.
   */
  async searchHybrid(query: string, options: HybridSearchOptions = {}): Promise<SearchResult> {
    const text = (query ?? '').trim();
    const image = options.image && options.image.length > 0 ? options.image : null;
    if (!text && !image) {
      throw new QueryError('Provide query text, an image, or both');
    }

    const weight = options.weight ?? DEFAULT_HYBRID_WEIGHT;
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new QueryError('weight must be between 0 and 1');
    }
    const scoped: SearchOptions = { ...options, kind: options.kind ?? 'airport' };

    if (!image) {
      return this.searchText(text, scoped);
    }
    if (!text || weight <= 0) {
      return this.searchImage(image, scoped);
    }
    if (weight >= 1) {
      return this.searchText(text, scoped);
    }

    const { kind, k, filters } = this.resolve(scoped, 'airport');
    this.logger.log(
      `hybrid search kind=${kind} k=${k} weight=${weight} filters=${describeFilters(filters)}`,
    );

    const textVector = await this.embeddingService.embedText(text);
    const keywords = extractKeywords(text);

    let imageVector: number[];
    try {
      imageVector = await this.embedQueryImage(image);
    } catch (error) {
      if (!(error instanceof QueryError)) {
        throw error;
      }
      this.logger.warn(`Hybrid image not usable, ranking by text only: ${error.message}`);
      return this.rank(kind, k, filters, [{ vector: textVector, weight: 1 }], keywords, true);
    }

    const terms: DistanceTerm[] = [
      { vector: textVector, weight },
      { vector: imageVector, weight: 1 - weight },
    ];
    return this.rank(kind, k, filters, terms, keywords, false);
  }

  /** A malformed upload is the caller's fault, so it surfaces as QueryError. */
  private async embedQueryImage(image: Uint8Array): Promise<number[]> {
    try {
      return await this.embeddingService.embedImage(image, MAX_UPLOAD_BYTES);
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw new QueryError(`Image could not be embedded: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  private async rank(
    kind: EntityKind,
    k: number,
    filters: SearchFilters,
    terms: DistanceTerm[],
    keywords: string[],
    degraded: boolean,
  ): Promise<SearchResult> {
    const hits = await this.store.search({ kind, terms, keywords, filters, limit: k });
    return { count: hits.length, degraded, hits: hits.map(toResultItem) };
  }

  private resolve(
    options: SearchOptions,
    defaultKind: EntityKind,
  ): { kind: EntityKind; k: number; filters: SearchFilters } {
    const kind = options.kind ?? defaultKind;
    const k = options.k ?? DEFAULT_TOP_K;
    if (!Number.isInteger(k) || k < 1 || k > MAX_TOP_K) {
      throw new QueryError(`k must be an integer between 1 and ${MAX_TOP_K}`);
    }

    const filters = compactFilters(options.filters ?? {});
    if (kind === 'airline') {
      const unsupported = AIRPORT_ONLY_FILTERS.filter((name) => filters[name] !== undefined);
      if (unsupported.length > 0) {
        throw new QueryError(`Filters not supported for airlines: ${unsupported.join(', ')}`);
      }
    }
    for (const [min, max] of [
      ['minLatitude', 'maxLatitude'],
      ['minLongitude', 'maxLongitude'],
    ] as const) {
      const low = filters[min];
      const high = filters[max];
      if (low !== undefined && high !== undefined && low > high) {
        throw new QueryError(`${min} must not exceed ${max}`);
      }
    }
    return { kind, k, filters };
  }
}

/** Drop unset and blank filters so they never reach the SQL. */
function compactFilters(filters: SearchFilters): SearchFilters {
  const compact: SearchFilters = {};
  for (const key of ['country', 'city', 'style', 'tag'] as const) {
    const value = filters[key]?.trim();
    if (value) {
      compact[key] = value;
    }
  }
  if (filters.hasImage !== undefined) {
    compact.hasImage = filters.hasImage;
  }
  for (const key of ['minLatitude', 'maxLatitude', 'minLongitude', 'maxLongitude'] as const) {
    const value = filters[key];
    if (value !== undefined && Number.isFinite(value)) {
      compact[key] = value;
    }
  }
  return compact;
}

function describeFilters(filters: SearchFilters): string {
  return Object.keys(filters).length > 0 ? JSON.stringify(filters) : 'none';
}

function toResultItem(hit: SearchHit): SearchResultItem {
  return {
    id: hit.id,
    kind: hit.kind,
    name: hit.name,
    city: hit.city,
    country: hit.country,
    iata: hit.iata,
    icao: hit.icao,
    url: hit.url,
    metadata: hit.metadata,
    distance: hit.distance,
  };
}
