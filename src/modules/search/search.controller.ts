import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import {
  ApiBody,
  ApiConsumes,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { QueryError } from '../../common/errors/skyvision.errors';
import { MAX_UPLOAD_BYTES } from '../../common/utils/image.util';
import { SearchResult, SearchService } from './search.service';
import {
  HybridSearchDto,
  ImageSearchFormDto,
  SearchResponseDto,
  TextSearchDto,
} from './dto/search.dto';

@ApiTags('search')
@Controller('search')
export class SearchController {
  constructor(private readonly searchService: SearchService) {}

  @Post('text')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Text similarity search',
    description:
      'Embeds the query with CLIP and ranks entities by cosine distance. Query words from the architecture vocabulary (glass, modern, garden, ...) that match metadata style or tags rank first.',
  })
  @ApiResponse({ status: 200, type: SearchResponseDto })
  @ApiResponse({ status: 400, description: 'Empty query or invalid filters' })
  @ApiResponse({ status: 503, description: 'Embedding model unavailable' })
  async searchText(@Body() dto: TextSearchDto): Promise<SearchResult> {
    return this.searchService.searchText(dto.query, {
      k: dto.k,
      kind: dto.kind,
      filters: dto.filters,
    });
  }

  @Post('image')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('file', { limits: { fileSize: MAX_UPLOAD_BYTES } }))
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      required: ['file'],
      properties: {
        file: { type: 'string', format: 'binary' },
        k: { type: 'integer', example: 10 },
        kind: { type: 'string', enum: ['airport', 'airline'] },
        country: { type: 'string' },
        style: { type: 'string' },
        tag: { type: 'string' },
      },
    },
  })
  @ApiOperation({
    summary: 'Image similarity search',
    description: 'Ranks entities by cosine distance to the uploaded image (JPEG, PNG, WEBP or GIF, at most 5 MB).',
  })
  @ApiResponse({ status: 200, type: SearchResponseDto })
  @ApiResponse({ status: 400, description: 'Missing or malformed image' })
  @ApiResponse({ status: 413, description: 'Image larger than 5 MB' })
  @ApiResponse({ status: 503, description: 'Embedding model unavailable' })
  async searchImage(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() form: ImageSearchFormDto,
  ): Promise<SearchResult> {
    if (!file) {
      throw new QueryError('An image file is required (multipart field "file")');
    }
    const { k, kind, ...filters } = form;
    return this.searchService.searchImage(file.buffer, { k, kind, filters });
  }

  @Post('hybrid')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Hybrid text + image search',
    description:
      'score = weight * text_distance + (1 - weight) * image_distance. weight=1 equals the text search, weight=0 the image search. If the image cannot be embedded the text ranking is returned with degraded=true.',
  })
  @ApiResponse({ status: 200, type: SearchResponseDto })
  @ApiResponse({ status: 400, description: 'Neither text nor image, or invalid parameters' })
  @ApiResponse({ status: 503, description: 'Embedding model unavailable' })
  async searchHybrid(@Body() dto: HybridSearchDto): Promise<SearchResult> {
    return this.searchService.searchHybrid(dto.query, {
      image: dto.imageBase64 ? decodeBase64Image(dto.imageBase64) : null,
      weight: dto.weight,
      k: dto.k,
      kind: dto.kind,
      filters: dto.filters,
    });
  }
}

function decodeBase64Image(value: string): Buffer {
  const comma = value.indexOf(',');
  const payload = value.startsWith('data:') && comma >= 0 ? value.slice(comma + 1) : value;
  return Buffer.from(payload.replace(/\s+/g, ''), 'base64');
}

