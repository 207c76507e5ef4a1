import { HttpException, HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { YouTubeApiService } from '../youtube/youtube-api.service';
import { YouTubeCacheService } from '../youtube/youtube-cache.service';
import {
  YOUTUBE_COLLECTION,
  YOUTUBE_WATCH_URL,
} from '../youtube/config/youtube.config';
import { CatalogFailure, CategoryMap } from '../youtube/youtube.types';
import { PopularVideosQueryDto } from './dto/popular-videos.dto';
import {
  DisplayRecord,
  FilterState,
  PopularVideosView,
  VideoListEntry,
} from './videos.types';
import { normalizeItems } from './utils/video-normalizer.util';
import {
  buildFilterOptions,
  filterRecords,
  resolveViewRange,
} from './utils/video-filter.util';
import { ErrorCodes } from '../common/errors/error-codes';
import { LoggerHelper } from '../common/utils/logger.helper';

export const FETCH_GUIDANCE = [
  '• 환경 변수 YOUTUBE_API_KEY를 설정했는지 확인하세요.',
  '• API 쿼터 초과 또는 키 권한 문제일 수 있습니다.',
] as const;

export const EMPTY_RESULT_MESSAGE = '표시할 동영상이 없습니다.';

/** 조회 실패 → HTTP 상태/에러 코드 */
export function toFetchException(failure: CatalogFailure): HttpException {
  const [status, code] = ((): [HttpStatus, ErrorCodes] => {
    switch (failure.cause.kind) {
      case 'MISSING_CREDENTIAL':
        return [HttpStatus.SERVICE_UNAVAILABLE, ErrorCodes.MISSING_CREDENTIAL];
      case 'UPSTREAM_STATUS':
        return [HttpStatus.BAD_GATEWAY, ErrorCodes.YOUTUBE_API_ERROR];
      case 'TIMEOUT':
        return [HttpStatus.GATEWAY_TIMEOUT, ErrorCodes.TIMEOUT_ERROR];
      case 'NETWORK':
        return [HttpStatus.BAD_GATEWAY, ErrorCodes.NETWORK_ERROR];
      case 'UNEXPECTED':
        return [HttpStatus.INTERNAL_SERVER_ERROR, ErrorCodes.INTERNAL_SERVER_ERROR];
    }
  })();

  return new HttpException(
    {
      code,
      message: failure.message,
      details: { kind: failure.cause.kind, guidance: [...FETCH_GUIDANCE] },
    },
    status,
  );
}

function toListEntry(record: DisplayRecord, index: number): VideoListEntry {
  return {
    ...record,
    rank: index + 1,
    watchUrl: `${YOUTUBE_WATCH_URL}${encodeURIComponent(record.id)}`,
  };
}

/**
 * 인기 동영상 대시보드 파이프라인
 * 캐시 조회 → 정규화 → 필터 → 응답
 */
@Injectable()
export class VideosService {
  private readonly logger = new Logger(VideosService.name);
  private readonly apiKey: string;

  constructor(
    config: ConfigService,
    private readonly api: YouTubeApiService,
    private readonly cache: YouTubeCacheService,
  ) {
    this.apiKey = (config.get<string>('YOUTUBE_API_KEY') ?? '').trim();
    if (!this.apiKey) {
      this.logger.warn('⚠️ YOUTUBE API KEY 미설정: YOUTUBE_API_KEY를 확인하세요.');
    }
  }

  async getPopularVideos(
    query: PopularVideosQueryDto,
    now: Date = new Date(),
  ): Promise<PopularVideosView> {
    const region = this.api.resolveRegion(query.region);
    const result = await this.cache.getPopularItems(
      this.apiKey,
      region,
      YOUTUBE_COLLECTION.maxResults,
    );

    // 실패/빈 결과에서는 이후 단계를 진행하지 않는다
    if (!result.ok) throw toFetchException(result);
    if (result.items.length === 0) {
      LoggerHelper.logWarning(this.logger, '인기 동영상', EMPTY_RESULT_MESSAGE, { region });
      return { status: 'empty', region, message: EMPTY_RESULT_MESSAGE };
    }

    const categories = await this.cache.getCategories(this.apiKey, region);
    const records = normalizeItems(result.items, categories, now);
    const options = buildFilterOptions(records, categories);
    const viewCountRange = resolveViewRange(
      options.viewRange,
      query.minViews,
      query.maxViews,
    );

    const state: FilterState = {
      searchText: query.q ?? '',
      selectedCategoryIds: new Set(query.categories ?? []),
      viewCountRange,
    };
    const filtered = filterRecords(records, state);

    return {
      status: 'ok',
      region,
      totalCount: records.length,
      filteredCount: filtered.length,
      summary: `총 ${filtered.length}개 동영상`,
      filters: {
        searchText: state.searchText.trim(),
        categoryIds: [...state.selectedCategoryIds],
        viewCountRange,
      },
      options,
      items: filtered.map(toListEntry),
    };
  }

  async getCategories(regionCode?: string): Promise<CategoryMap> {
    return this.cache.getCategories(this.apiKey, this.api.resolveRegion(regionCode));
  }

  /** 새로고침: 모든 캐시 즉시 비움 */
  refresh(): { cleared: number } {
    return { cleared: this.cache.invalidateAll() };
  }
}
