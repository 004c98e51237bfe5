import { Module } from '@nestjs/common';
import { AxiosImageFetcher, ImageFetcher } from './image-fetcher';

@Module({
  providers: [{ provide: ImageFetcher, useClass: AxiosImageFetcher }],
  exports: [ImageFetcher],
})
export class FetchModule {}
