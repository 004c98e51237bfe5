import { readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { ParseError, errorMessage } from '../../common/errors/skyvision.errors';
import { fileExists, writeFileAtomic } from '../../common/utils/file.util';
import { isEntityKind } from '../../types/entity.types';
import { MediaRow } from './pipeline.types';

export const MEDIA_COLUMNS = [
  'entity_type',
  'id',
  'url',
  'license',
  'attribution',
  'style',
  'tags',
] as const;

export const LOCAL_MEDIA_PREFIX = '/media/';

export const LOCALIZED_TABLE_NAME = 'image_urls_local.csv';

export interface MediaTable {
  rows: MediaRow[];
  // rows without a known entity type or an integer id
  invalid: number;
}

export function parseMediaTable(content: string, file: string): MediaTable {
  let records: unknown;
  try {
    records = parse(content, {
      columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
      skip_empty_lines: true,
      relax_column_count: true,
      bom: true,
    });
  } catch (error) {
    throw new ParseError(errorMessage(error), file);
  }
  if (!Array.isArray(records)) {
    throw new ParseError('Unexpected CSV structure', file);
  }

  const rows: MediaRow[] = [];
  let invalid = 0;
  for (const record of records) {
    const row = toMediaRow(record);
    if (row) {
      rows.push(row);
    } else {
      invalid++;
    }
  }
  return { rows, invalid };
}

/** Read the table; a missing file is an empty table. */
export async function readMediaTable(path: string): Promise<MediaTable> {
  if (!(await fileExists(path))) {
    return { rows: [], invalid: 0 };
  }
  return parseMediaTable(await readFile(path, 'utf-8'), path);
}

/** The localize stage writes its rewritten table next to the input table. */
export function localizedTablePath(urlsCsv: string): string {
  return join(dirname(urlsCsv), LOCALIZED_TABLE_NAME);
}

/** The localized table when it exists, else the input table. */
export async function readPreferredMediaTable(
  urlsCsv: string,
): Promise<MediaTable & { source: string }> {
  const localized = localizedTablePath(urlsCsv);
  const source = (await fileExists(localized)) ? localized : urlsCsv;
  return { ...(await readMediaTable(source)), source };
}

export async function writeMediaTable(path: string, rows: MediaRow[]): Promise<void> {
  const header = `${MEDIA_COLUMNS.join(',')}\n`;
  if (rows.length === 0) {
    await writeFileAtomic(path, header);
    return;
  }
  const body = stringify(
    rows.map((row) => [
      row.entityType,
      String(row.id),
      row.url ?? '',
      row.license ?? '',
      row.attribution ?? '',
      row.style ?? '',
      row.tags ?? '',
    ]),
  );
  await writeFileAtomic(path, header + body);
}

export function isLocalMediaUrl(url: string | null): url is string {
  return url !== null && url.startsWith(LOCAL_MEDIA_PREFIX);
}

/** Index rows by `<kind>:<id>`, first row per entity wins. */
export function indexMediaRows(rows: MediaRow[]): Map<string, MediaRow> {
  const index = new Map<string, MediaRow>();
  for (const row of rows) {
    const key = mediaKey(row.entityType, row.id);
    if (!index.has(key)) {
      index.set(key, row);
    }
  }
  return index;
}

export function mediaKey(kind: string, id: number): string {
  return `${kind}:${id}`;
}

function toMediaRow(record: unknown): MediaRow | null {
  if (typeof record !== 'object' || record === null) {
    return null;
  }
  const field = (name: string): string | null => {
    const value: unknown = Reflect.get(record, name);
    if (typeof value !== 'string') {
      return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  };

  const entityType = field('entity_type')?.toLowerCase();
  const id = Number(field('id') ?? Number.NaN);
  if (!isEntityKind(entityType) || !Number.isInteger(id)) {
    return null;
  }

  return {
    entityType,
    id,
    url: field('url'),
    license: field('license'),
    attribution: field('attribution'),
    style: field('style'),
    tags: field('tags'),
  };
}
