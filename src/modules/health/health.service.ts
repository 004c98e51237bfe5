import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../../common/errors/skyvision.errors';
import { ENTITY_KINDS, EntityKind } from '../../types/entity.types';
import { EntityStore } from '../catalog/entity-store';
import { EmbeddingService, EmbeddingStatus } from '../embedding/embedding.service';

export const SERVICE_NAME = 'skyvision';

export interface Readiness {
  service: string;
  ready: boolean;
  database: { ok: boolean; error: string | null };
  model: EmbeddingStatus;
  counts: Partial<Record<EntityKind, number>>;
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    private readonly store: EntityStore,
    private readonly embeddingService: EmbeddingService,
  ) {}

  /** Ready when the database answers and the model is loaded. */
  async readiness(): Promise<Readiness> {
    const database: Readiness['database'] = { ok: true, error: null };
    const counts: Readiness['counts'] = {};

    try {
      await this.store.ping();
      for (const kind of ENTITY_KINDS) {
        counts[kind] = await this.store.countRows(kind);
      }
    } catch (error) {
      database.ok = false;
      database.error = errorMessage(error);
      this.logger.warn(`Database not ready: ${database.error}`);
    }

    const model = this.embeddingService.getStatus();
    return {
      service: SERVICE_NAME,
      ready: database.ok && model.loaded,
      database,
      model,
      counts,
    };
  }
}
