import { Transform } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

const MAX_VIEW_COUNT = Number.MAX_SAFE_INTEGER;

/** "10,20" | ["10","20"] → ["10","20"] */
function toStringList(value: unknown): unknown {
  if (value === undefined || value === null || value === '') return undefined;
  const raw = Array.isArray(value) ? value : [value];
  return raw
    .flatMap((v) => (typeof v === 'string' ? v.split(',') : [v]))
    .map((v) => (typeof v === 'string' ? v.trim() : v))
    .filter((v) => v !== '');
}

/** 숫자 문자열만 정수로 바꾸고 나머지는 그대로 둬서 검증 단계에서 거른다 */
function toInteger(value: unknown): unknown {
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number(value);
  return value;
}

/**
 * 인기 동영상 조회 + 필터 요청 DTO
 */
export class PopularVideosQueryDto {
  @ApiPropertyOptional({
    description: '지역 코드 (2자리, 비우면 기본 지역)',
    example: 'KR',
  })
  @IsOptional()
  @IsString()
  @MaxLength(2)
  region?: string;

  @ApiPropertyOptional({
    description: '검색어 (제목/채널)',
    example: '음악',
  })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  q?: string;

  @ApiPropertyOptional({
    description: '카테고리 ID 목록 (쉼표 구분)',
    example: '10,20',
    type: String,
  })
  @IsOptional()
  @Transform(({ value }) => toStringList(value))
  @IsArray()
  @IsString({ each: true })
  categories?: string[];

  @ApiPropertyOptional({ description: '최소 조회수', example: 0 })
  @IsOptional()
  @Transform(({ value }) => toInteger(value))
  @IsInt()
  @Min(0)
  @Max(MAX_VIEW_COUNT)
  minViews?: number;

  @ApiPropertyOptional({ description: '최대 조회수', example: 100000000 })
  @IsOptional()
  @Transform(({ value }) => toInteger(value))
  @IsInt()
  @Min(0)
  @Max(MAX_VIEW_COUNT)
  maxViews?: number;
}

export class RegionQueryDto {
  @ApiPropertyOptional({ description: '지역 코드 (2자리)', example: 'KR' })
  @IsOptional()
  @IsString()
  @MaxLength(2)
  region?: string;
}
