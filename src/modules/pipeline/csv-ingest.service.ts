import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { extname, join } from 'path';
import { parse } from 'csv-parse/sync';
import { ParseError, errorMessage, isError } from '../../common/errors/skyvision.errors';
import { fileExists, writeJsonFile } from '../../common/utils/file.util';
import {
  AirlineRecord,
  AirportRecord,
  EntityKind,
  EntityRecord,
} from '../../types/entity.types';
import {
  CSV_HEADER_ALIASES,
  DAT_COLUMNS,
  INPUT_BASENAMES,
  REQUIRED_DAT_WIDTH,
} from './openflights.columns';
import { recordsPath } from './processed-data';
import { IngestCounts, PerKind } from './pipeline.types';

export interface IngestOptions {
  rawDir: string;
  outDir: string;
  // malformed rows tolerated per file before aborting; 0 aborts on the first
  maxErrors?: number;
}

interface RawRow {
  line: number;
  fields: Map<string, string>;
  // set when a positional row has fewer columns than are read
  width?: number;
}

/**
 * Reads OpenFlights airports/airlines files and writes normalized, id-sorted
 * JSON for the later stages.
 */
@Injectable()
export class CsvIngestService {
  private readonly logger = new Logger(CsvIngestService.name);

  async ingest(options: IngestOptions): Promise<PerKind<IngestCounts>> {
    const maxErrors = Math.max(0, options.maxErrors ?? 0);
    const airport = await this.ingestKind('airport', options.rawDir, options.outDir, maxErrors);
    const airline = await this.ingestKind('airline', options.rawDir, options.outDir, maxErrors);
    return { airport, airline };
  }

  /** `.dat` is preferred over `.csv` when both exist. */
  async resolveInput(rawDir: string, kind: EntityKind): Promise<string> {
    const base = INPUT_BASENAMES[kind];
    for (const ext of ['.dat', '.csv']) {
      const candidate = join(rawDir, `${base}${ext}`);
      if (await fileExists(candidate)) {
        return candidate;
      }
    }
    throw new ParseError(`Could not find ${base}.dat or ${base}.csv`, rawDir);
  }

  private async ingestKind(
    kind: EntityKind,
    rawDir: string,
    outDir: string,
    maxErrors: number,
  ): Promise<IngestCounts> {
    const file = await this.resolveInput(rawDir, kind);
    const rawRows = readRawRows(await readFile(file, 'utf-8'), file, kind);

    const counts = emptyCounts(file);
    const byId = new Map<number, EntityRecord>();
    let errors = 0;

    for (const raw of rawRows) {
      counts.rows++;
      let record: EntityRecord;
      try {
        record = kind === 'airport' ? toAirport(raw, file) : toAirline(raw, file);
      } catch (error) {
        if (!(error instanceof ParseError)) {
          throw error;
        }
        errors++;
        if (errors > maxErrors) {
          throw error;
        }
        counts.skipped++;
        this.logger.warn(`Skipping malformed row: ${error.message}`);
        continue;
      }

      if (byId.has(record.id)) {
        counts.duplicates++;
        continue;
      }
      byId.set(record.id, record);
    }

    const records = [...byId.values()].sort((a, b) => a.id - b.id);
    const outPath = recordsPath(outDir, kind);
    await writeJsonFile(outPath, records);
    counts.written = records.length;

    this.logger.log(
      `Ingested ${file}: ${counts.written} written, ${counts.skipped} skipped, ` +
        `${counts.duplicates} duplicates -> ${outPath}`,
    );
    return counts;
  }
}

function emptyCounts(file: string): IngestCounts {
  return { file, rows: 0, written: 0, skipped: 0, duplicates: 0 };
}

/**
 * Parse the file into rows keyed by canonical field name. `.dat` files are
 * positional; anything else must carry a header row.
 */
function readRawRows(content: string, file: string, kind: EntityKind): RawRow[] {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      info: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    const line: unknown = isError(error) ? Reflect.get(error, 'lines') : undefined;
    throw new ParseError(
      errorMessage(error),
      file,
      typeof line === 'number' ? line : undefined,
    );
  }
  if (!Array.isArray(parsed)) {
    throw new ParseError('Unexpected CSV structure', file);
  }

  const lines = parsed.map((entry: unknown) => toLine(entry, file));
  const positional = extname(file).toLowerCase() === '.dat';

  if (positional) {
    const columns = DAT_COLUMNS[kind];
    return lines.map(({ line, values }) => {
      if (values.length < REQUIRED_DAT_WIDTH[kind]) {
        return { line, fields: new Map<string, string>(), width: values.length };
      }
      const fields = new Map<string, string>();
      values.forEach((value, i) => {
        if (i < columns.length) {
          fields.set(columns[i], value);
        }
      });
      return { line, fields };
    });
  }

  const [header, ...body] = lines;
  if (!header) {
    return [];
  }
  const aliases = CSV_HEADER_ALIASES[kind];
  const mapping = header.values.map((name) => aliases[name.trim().toLowerCase()]);
  if (!mapping.includes('id') || !mapping.includes('name')) {
    throw new ParseError('Header must include id and name columns', file, header.line);
  }

  return body.map(({ line, values }) => {
    const fields = new Map<string, string>();
    values.forEach((value, i) => {
      const field = mapping[i];
      if (field && !fields.has(field)) {
        fields.set(field, value);
      }
    });
    return { line, fields };
  });
}

function toLine(entry: unknown, file: string): { line: number; values: string[] } {
  if (typeof entry !== 'object' || entry === null) {
    throw new ParseError('Unexpected CSV record', file);
  }
  const record: unknown = Reflect.get(entry, 'record');
  const info: unknown = Reflect.get(entry, 'info');
  const line: unknown =
    typeof info === 'object' && info !== null ? Reflect.get(info, 'lines') : undefined;
  if (!Array.isArray(record) || typeof line !== 'number') {
    throw new ParseError('Unexpected CSV record', file);
  }
  return { line, values: record.map((value: unknown) => String(value ?? '')) };
}

function text(row: RawRow, field: string): string | null {
  const value = row.fields.get(field);
  if (value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' || trimmed === '\\N' ? null : trimmed;
}

function code(row: RawRow, field: string): string | null {
  return text(row, field)?.toUpperCase() ?? null;
}

function requireShape(row: RawRow, file: string): void {
  if (row.width !== undefined) {
    throw new ParseError(`Too few columns (${row.width})`, file, row.line);
  }
}

function parseId(row: RawRow, file: string): number {
  const raw = text(row, 'id');
  if (raw === null || !/^-?\d+$/.test(raw)) {
    throw new ParseError(`Invalid id: ${JSON.stringify(raw ?? '')}`, file, row.line);
  }
  return parseInt(raw, 10);
}

function parseName(row: RawRow, file: string): string {
  const name = text(row, 'name');
  if (name === null) {
    throw new ParseError('Missing name', file, row.line);
  }
  return name;
}

function parseCoordinate(row: RawRow, field: string, limit: number, file: string): number | null {
  const raw = text(row, field);
  if (raw === null) {
    return null;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || Math.abs(value) > limit) {
    throw new ParseError(`Invalid ${field}: ${JSON.stringify(raw)}`, file, row.line);
  }
  return value;
}

function toAirport(row: RawRow, file: string): AirportRecord {
  requireShape(row, file);
  return {
    id: parseId(row, file),
    name: parseName(row, file),
    city: text(row, 'city'),
    country: text(row, 'country'),
    iata: code(row, 'iata'),
    icao: code(row, 'icao'),
    latitude: parseCoordinate(row, 'latitude', 90, file),
    longitude: parseCoordinate(row, 'longitude', 180, file),
  };
}

function toAirline(row: RawRow, file: string): AirlineRecord {
  requireShape(row, file);
  const active = code(row, 'active');
  return {
    id: parseId(row, file),
    name: parseName(row, file),
    alias: text(row, 'alias'),
    iata: code(row, 'iata'),
    icao: code(row, 'icao'),
    callsign: text(row, 'callsign'),
    country: text(row, 'country'),
    active: active === 'Y' || active === 'N' ? active : null,
  };
}
