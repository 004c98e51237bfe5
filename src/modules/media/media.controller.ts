import { Controller, Get, Query, Res } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { MediaCheck, MediaService } from './media.service';

@ApiTags('media')
@Controller()
export class MediaController {
  constructor(private readonly mediaService: MediaService) {}

  @Get('media-check')
  @ApiOperation({ summary: 'Check that a cached media file exists' })
  @ApiQuery({ name: 'filename', example: 'airport_1.jpg' })
  @ApiResponse({ status: 200, description: 'File exists' })
  @ApiResponse({ status: 404, description: 'File not found' })
  async mediaCheck(@Query('filename') filename?: string): Promise<MediaCheck> {
    return this.mediaService.check(filename);
  }

  @Get('proxy')
  @ApiOperation({
    summary: 'Image proxy',
    description: 'Fetches a remote image (at most 25 MB) and relays it with its content type.',
  })
  @ApiQuery({ name: 'u', description: 'Absolute http(s) image URL' })
  @ApiResponse({ status: 200, description: 'Image bytes' })
  @ApiResponse({ status: 400, description: 'Not an http(s) URL' })
  @ApiResponse({ status: 502, description: 'Upstream unreachable' })
  async proxy(@Query('u') url: string | undefined, @Res() res: Response): Promise<void> {
    const image = await this.mediaService.proxy(url);
    res
      .status(200)
      .setHeader('Content-Type', image.contentType ?? 'application/octet-stream')
      .setHeader('Cache-Control', 'no-cache')
      .send(image.data);
  }
}
