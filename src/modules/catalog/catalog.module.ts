import { Module } from '@nestjs/common';
import { EntityStore } from './entity-store';
import { MariaDbEntityStore } from './mariadb-entity.store';

@Module({
  providers: [{ provide: EntityStore, useClass: MariaDbEntityStore }],
  exports: [EntityStore],
})
export class CatalogModule {}
