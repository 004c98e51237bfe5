import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager, In } from 'typeorm';
import { Airport } from '../../entities/airport.entity';
import { Airline } from '../../entities/airline.entity';
import { EntityKind, StoredEntity, tableFor } from '../../types/entity.types';
import { SearchHit, UpsertCounts, VectorSearchQuery } from './catalog.types';
import { EntityStore } from './entity-store';
import { buildSearchQuery, buildUpsertStatement, mapSearchRow } from './catalog.sql';

const VECTOR_COLUMN_TYPE = /^vector\((\d+)\)$/i;

@Injectable()
export class MariaDbEntityStore extends EntityStore {
  private readonly logger = new Logger(MariaDbEntityStore.name);

  private connecting: Promise<DataSource> | null = null;

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {
    super();
  }

  /**
   * The data source is registered uninitialized; the first query connects.
   * A failed attempt is not cached, so the next call tries again.
   */
  private async connection(): Promise<DataSource> {
    if (this.dataSource.isInitialized) {
      return this.dataSource;
    }
    if (!this.connecting) {
      this.logger.log('Connecting to MariaDB...');
      this.connecting = this.dataSource.initialize().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  async ping(): Promise<void> {
    await (await this.connection()).query('SELECT 1');
  }

  async countRows(kind: EntityKind): Promise<number> {
    const db = await this.connection();
    const rows: unknown = await db.query(
      `SELECT COUNT(*) AS count FROM ${tableFor(kind)}`,
    );
    return Number(firstField(rows, 'count') ?? 0);
  }

  async vectorDimension(kind: EntityKind): Promise<number | null> {
    const db = await this.connection();
    const rows: unknown = await db.query(
      `SELECT COLUMN_TYPE AS column_type
         FROM information_schema.COLUMNS
        WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ? AND COLUMN_NAME = 'embedding'`,
      [tableFor(kind)],
    );
    const columnType = firstField(rows, 'column_type');
    const match = VECTOR_COLUMN_TYPE.exec(String(columnType ?? '').trim());
    return match ? parseInt(match[1], 10) : null;
  }

  async upsertChunk<K extends EntityKind>(
    kind: K,
    rows: StoredEntity<K>[],
  ): Promise<UpsertCounts> {
    if (rows.length === 0) {
      return { inserted: 0, updated: 0 };
    }

    const db = await this.connection();
    return db.transaction(async (manager) => {
      const existing = await this.existingIds(
        manager,
        kind,
        rows.map((row) => row.id),
      );
      const { sql, params } = buildUpsertStatement(kind, rows);
      await manager.query(sql, params);

      const updated = rows.filter((row) => existing.has(row.id)).length;
      return { inserted: rows.length - updated, updated };
    });
  }

  async search(query: VectorSearchQuery): Promise<SearchHit[]> {
    const { sql, params } = buildSearchQuery(query);
    const db = await this.connection();
    const rows: unknown = await db.query(sql, params);
    if (!Array.isArray(rows)) {
      return [];
    }
    this.logger.debug(`${tableFor(query.kind)}: ${rows.length} rows ranked`);
    return rows.map((row: unknown) => mapSearchRow(query.kind, row));
  }

  private async existingIds(
    manager: EntityManager,
    kind: EntityKind,
    ids: number[],
  ): Promise<Set<number>> {
    const found =
      kind === 'airport'
        ? (await manager.find(Airport, { select: { id: true }, where: { id: In(ids) } })).map(
            (row) => row.id,
          )
        : (await manager.find(Airline, { select: { id: true }, where: { id: In(ids) } })).map(
            (row) => row.id,
          );
    return new Set(found);
  }
}

function firstField(rows: unknown, field: string): unknown {
  if (!Array.isArray(rows) || rows.length === 0) {
    return undefined;
  }
  const [row]: unknown[] = rows;
  return typeof row === 'object' && row !== null ? Reflect.get(row, field) : undefined;
}
