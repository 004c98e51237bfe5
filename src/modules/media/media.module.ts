import { Module } from '@nestjs/common';
import { FetchModule } from '../fetch/fetch.module';
import { MediaController } from './media.controller';
import { MediaService } from './media.service';

@Module({
  imports: [FetchModule],
  providers: [MediaService],
  controllers: [MediaController],
  exports: [MediaService],
})
export class MediaModule {}
