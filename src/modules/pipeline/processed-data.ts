import { join } from 'path';
import { ParseError, errorMessage } from '../../common/errors/skyvision.errors';
import { readJsonFile } from '../../common/utils/file.util';
import { isNumberArray } from '../../common/utils/vector.util';
import {
  AirlineRecord,
  AirportRecord,
  EmbeddingRecord,
  EntityKind,
  EntityRecord,
  tableFor,
} from '../../types/entity.types';

/*
 * Layout of the processed directory shared by the pipeline stages:
 *   <dir>/airports.json             normalized records, sorted by id
 *   <dir>/airlines.json
 *   <dir>/embeddings/airports.json  EmbeddingRecord[]
 *   <dir>/embeddings/airlines.json
 */

export function recordsPath(processedDir: string, kind: EntityKind): string {
  return join(processedDir, `${tableFor(kind)}.json`);
}

export function embeddingsPath(processedDir: string, kind: EntityKind): string {
  return join(processedDir, 'embeddings', `${tableFor(kind)}.json`);
}

export async function readRecords(processedDir: string, kind: EntityKind): Promise<EntityRecord[]> {
  const path = recordsPath(processedDir, kind);
  const data = await readStageFile(path, 'run the ingest stage first');
  const guard: (value: unknown) => value is EntityRecord =
    kind === 'airport' ? isAirportRecord : isAirlineRecord;
  return validateList(data, path, guard);
}

export async function readEmbeddings(
  processedDir: string,
  kind: EntityKind,
): Promise<EmbeddingRecord[]> {
  const path = embeddingsPath(processedDir, kind);
  const data = await readStageFile(path, 'run the embed stage first');
  return validateList(data, path, isEmbeddingRecord);
}

async function readStageFile(path: string, hint: string): Promise<unknown> {
  try {
    return await readJsonFile(path);
  } catch (error) {
    const reason = errorMessage(error);
    throw new ParseError(`Cannot read ${reason} (${hint})`, path);
  }
}

function validateList<T>(data: unknown, path: string, guard: (value: unknown) => value is T): T[] {
  if (!Array.isArray(data)) {
    throw new ParseError('Expected a JSON array', path);
  }
  const items: T[] = [];
  data.forEach((item: unknown, index) => {
    if (!guard(item)) {
      throw new ParseError(`Malformed entry at index ${index}`, path);
    }
    items.push(item);
  });
  return items;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): boolean {
  return value === null || typeof value === 'string';
}

function isNullableNumber(value: unknown): boolean {
  return value === null || (typeof value === 'number' && Number.isFinite(value));
}

export function isAirportRecord(value: unknown): value is AirportRecord {
  return (
    isObject(value) &&
    Number.isInteger(value.id) &&
    typeof value.name === 'string' &&
    isNullableString(value.city) &&
    isNullableString(value.country) &&
    isNullableString(value.iata) &&
    isNullableString(value.icao) &&
    isNullableNumber(value.latitude) &&
    isNullableNumber(value.longitude)
  );
}

export function isAirlineRecord(value: unknown): value is AirlineRecord {
  return (
    isObject(value) &&
    Number.isInteger(value.id) &&
    typeof value.name === 'string' &&
    isNullableString(value.alias) &&
    isNullableString(value.iata) &&
    isNullableString(value.icao) &&
    isNullableString(value.callsign) &&
    isNullableString(value.country) &&
    (value.active === null || value.active === 'Y' || value.active === 'N')
  );
}

export function isEmbeddingRecord(value: unknown): value is EmbeddingRecord {
  return (
    isObject(value) &&
    Number.isInteger(value.id) &&
    (value.source === 'image' || value.source === 'text') &&
    isNumberArray(value.vector)
  );
}
