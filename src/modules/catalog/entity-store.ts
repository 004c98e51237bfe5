import { EntityKind, StoredEntity } from '../../types/entity.types';
import { SearchHit, UpsertCounts, VectorSearchQuery } from './catalog.types';

/**
 * Persistence seam for airports and airlines. Used as the injection token;
 * production binds {@link MariaDbEntityStore}.
 */
export abstract class EntityStore {
  abstract ping(): Promise<void>;

  abstract countRows(kind: EntityKind): Promise<number>;

  /** Declared width of the vector column, or null when it cannot be read. */
  abstract vectorDimension(kind: EntityKind): Promise<number | null>;

  /**
   * Insert-or-overwrite one chunk atomically. Either every row of the chunk
   * is written or none is and the call rejects.
   */
  abstract upsertChunk<K extends EntityKind>(
    kind: K,
    rows: StoredEntity<K>[],
  ): Promise<UpsertCounts>;

  abstract search(query: VectorSearchQuery): Promise<SearchHit[]>;
}
