import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { ENTITY_KINDS, EntityKind } from '../../../types/entity.types';
import { MAX_TOP_K } from '../search.service';

// Form fields arrive as strings; 'false' must not become true
function toBoolean({ value }: { value: unknown }): unknown {
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  return value;
}

export class SearchFiltersDto {
  @ApiPropertyOptional({ description: 'Exact country', example: 'Testland' })
  @IsOptional()
  @IsString()
  country?: string;

  @ApiPropertyOptional({ description: 'Exact city (airports only)', example: 'Test City' })
  @IsOptional()
  @IsString()
  city?: string;

  @ApiPropertyOptional({ description: 'Metadata style', example: 'glass' })
  @IsOptional()
  @IsString()
  style?: string;

  @ApiPropertyOptional({ description: 'Metadata tag the entity must carry', example: 'modern' })
  @IsOptional()
  @IsString()
  tag?: string;

  @ApiPropertyOptional({ description: 'Only entities with (true) or without (false) media' })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  hasImage?: boolean;

  @ApiPropertyOptional({ description: 'Latitude lower bound (airports only)', example: -10 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(-90)
  @Max(90)
  minLatitude?: number;

  @ApiPropertyOptional({ description: 'Latitude upper bound (airports only)', example: 60 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(-90)
  @Max(90)
  maxLatitude?: number;

  @ApiPropertyOptional({ description: 'Longitude lower bound (airports only)', example: -30 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(-180)
  @Max(180)
  minLongitude?: number;

  @ApiPropertyOptional({ description: 'Longitude upper bound (airports only)', example: 50 })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(-180)
  @Max(180)
  maxLongitude?: number;
}

class BaseSearchDto {
  @ApiPropertyOptional({
    description: `Number of results (1-${MAX_TOP_K}, default: 10)`,
    example: 10,
    default: 10,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_TOP_K)
  k?: number;

  @ApiPropertyOptional({ description: 'Table to search', enum: ENTITY_KINDS })
  @IsOptional()
  @IsIn(ENTITY_KINDS)
  kind?: EntityKind;
}

export class TextSearchDto extends BaseSearchDto {
  @ApiProperty({ description: 'Search query text', example: 'modern glass architecture' })
  @IsString()
  @MaxLength(1000)
  query!: string;

  @ApiPropertyOptional({ type: SearchFiltersDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => SearchFiltersDto)
  filters?: SearchFiltersDto;
}

export class HybridSearchDto extends TextSearchDto {
  @ApiPropertyOptional({
    description: 'Query image, base64 (a data: URL prefix is accepted)',
  })
  @IsOptional()
  @IsString()
  imageBase64?: string;

  @ApiPropertyOptional({
    description: 'Weight of the text distance; the image gets 1 - weight',
    example: 0.5,
    default: 0.5,
  })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(1)
  weight?: number;
}

/** Multipart form fields sent alongside the uploaded image; filters are flat. */
export class ImageSearchFormDto extends SearchFiltersDto {
  @ApiPropertyOptional({ description: `Number of results (1-${MAX_TOP_K})`, example: 10 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_TOP_K)
  k?: number;

  @ApiPropertyOptional({ description: 'Table to search (default: airline)', enum: ENTITY_KINDS })
  @IsOptional()
  @IsIn(ENTITY_KINDS)
  kind?: EntityKind;
}

export class SearchHitDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ enum: ENTITY_KINDS })
  kind!: EntityKind;

  @ApiProperty({ example: 'Test Airport' })
  name!: string;

  @ApiPropertyOptional({ nullable: true, example: 'Test City' })
  city!: string | null;

  @ApiPropertyOptional({ nullable: true, example: 'Testland' })
  country!: string | null;

  @ApiPropertyOptional({ nullable: true, example: 'TST' })
  iata!: string | null;

  @ApiPropertyOptional({ nullable: true, example: 'TST1' })
  icao!: string | null;

  @ApiPropertyOptional({ nullable: true, description: 'Image or logo URL' })
  url!: string | null;

  @ApiPropertyOptional({
    nullable: true,
    example: { style: 'glass', tags: ['green', 'modern'], license: 'CC-BY' },
  })
  metadata!: Record<string, unknown> | null;

  @ApiProperty({ description: 'Cosine distance, or the blended score for hybrid', example: 0.21 })
  distance!: number;
}

export class SearchResponseDto {
  @ApiProperty({ example: 2 })
  count!: number;

  @ApiProperty({ description: 'Hybrid query fell back to text-only ranking' })
  degraded!: boolean;

  @ApiProperty({ type: [SearchHitDto] })
  hits!: SearchHitDto[];
}
