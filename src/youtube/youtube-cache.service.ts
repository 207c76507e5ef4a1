// src/youtube/youtube-cache.service.ts
import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { YouTubeApiService } from './youtube-api.service';
import { YOUTUBE_CACHE_TTL } from './config/youtube.config';
import { CatalogResponse, CategoryMap } from './youtube.types';
import { Clock, TtlCache, cacheKeyOf } from '../common/cache/ttl-cache';
import { LoggerHelper } from '../common/utils/logger.helper';

export const CACHE_CLOCK = Symbol('CACHE_CLOCK');

/**
 * YouTube 조회 캐시 파사드
 *
 * - 키: 호출 인자 전체 (키, 지역, 개수)
 * - TTL: 인기 목록 5분 / 카테고리 1시간
 * - 실패 결과도 그대로 캐시한다 (TTL 동안 같은 오류 노출)
 * - 같은 키의 동시 미스는 진행 중인 요청 하나를 공유한다
 */
@Injectable()
export class YouTubeCacheService {
  private readonly logger = new Logger(YouTubeCacheService.name);

  private readonly popular: TtlCache<CatalogResponse>;
  private readonly categories: TtlCache<CategoryMap>;
  private readonly inFlightPopular = new Map<string, Promise<CatalogResponse>>();
  private readonly inFlightCategories = new Map<string, Promise<CategoryMap>>();

  /** 무효화 세대: 무효화 이전에 시작된 요청은 결과를 캐시에 쓰지 않는다 */
  private generation = 0;

  constructor(
    private readonly api: YouTubeApiService,
    @Optional() @Inject(CACHE_CLOCK) clock?: Clock,
  ) {
    this.popular = new TtlCache<CatalogResponse>({
      ttlMs: YOUTUBE_CACHE_TTL.popularMs,
      clock,
    });
    this.categories = new TtlCache<CategoryMap>({
      ttlMs: YOUTUBE_CACHE_TTL.categoriesMs,
      clock,
    });
  }

  getPopularItems(
    apiKey: string,
    regionCode: string,
    limit: number,
  ): Promise<CatalogResponse> {
    return this.memoize(
      '인기 동영상',
      this.popular,
      this.inFlightPopular,
      cacheKeyOf(apiKey, regionCode, limit),
      () => this.api.fetchPopularItems(apiKey, regionCode, limit),
    );
  }

  getCategories(apiKey: string, regionCode: string): Promise<CategoryMap> {
    return this.memoize(
      '카테고리',
      this.categories,
      this.inFlightCategories,
      cacheKeyOf(apiKey, regionCode),
      () => this.api.fetchCategories(apiKey, regionCode),
    );
  }

  /** 새로고침: 두 캐시와 진행 중 요청을 모두 비운다 */
  invalidateAll(): number {
    this.generation++;
    const cleared = this.popular.invalidateAll() + this.categories.invalidateAll();
    this.inFlightPopular.clear();
    this.inFlightCategories.clear();
    LoggerHelper.logComplete(this.logger, '캐시 무효화', { cleared });
    return cleared;
  }

  private memoize<V>(
    label: string,
    cache: TtlCache<V>,
    inFlight: Map<string, Promise<V>>,
    key: string,
    load: () => Promise<V>,
  ): Promise<V> {
    const cached = cache.get(key);
    if (cached !== undefined) {
      this.logger.debug(`💾 [cache:hit] ${label}`);
      return Promise.resolve(cached);
    }

    const pending = inFlight.get(key);
    if (pending) return pending;

    const startedGeneration = this.generation;
    const promise = load()
      .then((value) => {
        if (startedGeneration === this.generation) cache.set(key, value);
        return value;
      })
      .finally(() => {
        if (inFlight.get(key) === promise) inFlight.delete(key);
      });

    inFlight.set(key, promise);
    return promise;
  }
}
