import { Module } from '@nestjs/common';
import { DatabaseModule } from './database.module';
import { HealthModule } from './modules/health/health.module';
import { MediaModule } from './modules/media/media.module';
import { SearchModule } from './modules/search/search.module';

@Module({
  imports: [DatabaseModule, SearchModule, HealthModule, MediaModule],
})
export class AppModule {}
