import { EntityKind, StoredEntity, tableFor } from '../../types/entity.types';
import { toVectorLiteral } from '../../common/utils/vector.util';
import { decodeMetadata } from '../../common/utils/metadata.util';
import { SearchFilters, SearchHit, VectorSearchQuery } from './catalog.types';

export interface SqlQuery {
  sql: string;
  params: unknown[];
}

const SELECT_COLUMNS: Record<EntityKind, string> = {
  airport: 'id, name, city, country, iata, icao, image_url AS url, metadata',
  airline: 'id, name, NULL AS city, country, iata, icao, logo_url AS url, metadata',
};

const URL_COLUMN: Record<EntityKind, string> = {
  airport: 'image_url',
  airline: 'logo_url',
};

const UPSERT_COLUMNS: Record<EntityKind, string[]> = {
  airport: [
    'id',
    'name',
    'city',
    'country',
    'iata',
    'icao',
    'latitude',
    'longitude',
    'image_url',
    'metadata',
    'embedding',
  ],
  airline: [
    'id',
    'name',
    'alias',
    'iata',
    'icao',
    'callsign',
    'country',
    'active',
    'logo_url',
    'metadata',
    'embedding',
  ],
};

/**
 * Ranked nearest-neighbour query. Filters narrow the candidate set before the
 * distance is computed; rows are ordered by keyword hits, then score, then id.
 */
export function buildSearchQuery(query: VectorSearchQuery): SqlQuery {
  const params: unknown[] = [];

  const distance = distanceExpression(query, params);
  const keywordHits = keywordHitsExpression(query.keywords, params);

  let sql =
    `SELECT ${SELECT_COLUMNS[query.kind]}, ${distance} AS distance, ${keywordHits} AS keyword_hits ` +
    `FROM ${tableFor(query.kind)}`;

  const where = filterClauses(query.kind, query.filters, params);
  if (where.length > 0) {
    sql += ` WHERE ${where.join(' AND ')}`;
  }

  sql +=
    query.keywords.length > 0
      ? ' ORDER BY keyword_hits DESC, distance ASC, id ASC'
      : ' ORDER BY distance ASC, id ASC';
  sql += ' LIMIT ?';
  params.push(query.limit);

  return { sql, params };
}

function distanceExpression(query: VectorSearchQuery, params: unknown[]): string {
  // A lone unit-weight term keeps the ORDER BY in the shape the vector index serves
  if (query.terms.length === 1 && query.terms[0].weight === 1) {
    params.push(toVectorLiteral(query.terms[0].vector));
    return 'VEC_DISTANCE_COSINE(embedding, VEC_FromText(?))';
  }
  const parts = query.terms.map((term) => {
    params.push(term.weight, toVectorLiteral(term.vector));
    return '? * VEC_DISTANCE_COSINE(embedding, VEC_FromText(?))';
  });
  return `(${parts.join(' + ')})`;
}

function keywordHitsExpression(keywords: string[], params: unknown[]): string {
  if (keywords.length === 0) {
    return '0';
  }
  const parts = keywords.map((keyword) => {
    const like = `%${keyword}%`;
    params.push(like, like);
    return (
      "(CASE WHEN LOWER(COALESCE(JSON_VALUE(metadata, '$.style'), '')) LIKE ? " +
      "OR LOWER(COALESCE(JSON_EXTRACT(metadata, '$.tags'), '')) LIKE ? THEN 1 ELSE 0 END)"
    );
  });
  return `(${parts.join(' + ')})`;
}

// the default collation folds case and accents and pads trailing spaces
const EXACT = 'COLLATE utf8mb4_nopad_bin';

export function filterClauses(
  kind: EntityKind,
  filters: SearchFilters,
  params: unknown[],
): string[] {
  const clauses: string[] = [];
  const urlColumn = URL_COLUMN[kind];

  if (filters.country !== undefined) {
    clauses.push(`country ${EXACT} = ?`);
    params.push(filters.country);
  }
  if (filters.city !== undefined) {
    clauses.push(`city ${EXACT} = ?`);
    params.push(filters.city);
  }
  if (filters.style !== undefined) {
    clauses.push(`JSON_VALUE(metadata, '$.style') ${EXACT} = ?`);
    params.push(filters.style);
  }
  if (filters.tag !== undefined) {
    clauses.push("JSON_CONTAINS(metadata, JSON_QUOTE(?), '$.tags')");
    params.push(filters.tag);
  }
  if (filters.hasImage === true) {
    clauses.push(`(${urlColumn} IS NOT NULL AND ${urlColumn} <> '')`);
  } else if (filters.hasImage === false) {
    clauses.push(`(${urlColumn} IS NULL OR ${urlColumn} = '')`);
  }
  if (filters.minLatitude !== undefined) {
    clauses.push('latitude >= ?');
    params.push(filters.minLatitude);
  }
  if (filters.maxLatitude !== undefined) {
    clauses.push('latitude <= ?');
    params.push(filters.maxLatitude);
  }
  if (filters.minLongitude !== undefined) {
    clauses.push('longitude >= ?');
    params.push(filters.minLongitude);
  }
  if (filters.maxLongitude !== undefined) {
    clauses.push('longitude <= ?');
    params.push(filters.maxLongitude);
  }
  return clauses;
}

/**
 * Multi-row insert-or-overwrite keyed by primary key. Every named field of an
 * existing row is replaced; nothing is merged.
 */
export function buildUpsertStatement<K extends EntityKind>(
  kind: K,
  rows: StoredEntity<K>[],
): SqlQuery {
  const columns = UPSERT_COLUMNS[kind];
  const placeholders = `(${columns
    .map((column) => (column === 'embedding' ? 'VEC_FromText(?)' : '?'))
    .join(', ')})`;

  const params: unknown[] = [];
  for (const row of rows) {
    params.push(...rowValues(kind, row));
  }

  const updates = columns
    .filter((column) => column !== 'id')
    .map((column) => `${column} = VALUES(${column})`)
    .join(', ');

  const sql =
    `INSERT INTO ${tableFor(kind)} (${columns.join(', ')}) ` +
    `VALUES ${rows.map(() => placeholders).join(', ')} ` +
    `ON DUPLICATE KEY UPDATE ${updates}`;

  return { sql, params };
}

function rowValues(kind: EntityKind, row: StoredEntity): unknown[] {
  const metadata =
    row.metadata && Object.keys(row.metadata).length > 0 ? JSON.stringify(row.metadata) : null;
  const embedding = toVectorLiteral(row.embedding);

  if (kind === 'airport' && 'latitude' in row) {
    return [
      row.id,
      row.name,
      row.city,
      row.country,
      row.iata,
      row.icao,
      row.latitude,
      row.longitude,
      row.url,
      metadata,
      embedding,
    ];
  }
  if (kind === 'airline' && 'callsign' in row) {
    return [
      row.id,
      row.name,
      row.alias,
      row.iata,
      row.icao,
      row.callsign,
      row.country,
      row.active,
      row.url,
      metadata,
      embedding,
    ];
  }
  throw new Error(`Row ${row.id} does not have the ${kind} shape`);
}

/** Map one raw result row of {@link buildSearchQuery}. */
export function mapSearchRow(kind: EntityKind, row: unknown): SearchHit {
  if (typeof row !== 'object' || row === null) {
    throw new Error('Unexpected search row');
  }
  const field = (name: string): unknown => Reflect.get(row, name);

  return {
    id: Number(field('id')),
    kind,
    name: String(field('name') ?? ''),
    city: nullableString(field('city')),
    country: nullableString(field('country')),
    iata: nullableString(field('iata')),
    icao: nullableString(field('icao')),
    url: nullableString(field('url'))?.trim() || null,
    metadata: decodeMetadata(field('metadata')),
    distance: Number(field('distance')),
    keywordHits: Number(field('keyword_hits') ?? 0),
  };
}

function nullableString(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  return String(value);
}
