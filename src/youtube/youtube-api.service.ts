// src/youtube/youtube-api.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { isAxiosError } from 'axios';
import {
  DEFAULT_REGION,
  YOUTUBE_API_BASE_URL,
  YOUTUBE_COLLECTION,
} from './config/youtube.config';
import {
  CatalogFailure,
  CatalogResponse,
  CategoryMap,
  YouTubeCategoryItem,
  YouTubeCategoryListResponse,
  YouTubeVideoItem,
  YouTubeVideoListResponse,
} from './youtube.types';
import { LoggerHelper } from '../common/utils/logger.helper';
import { maskKey } from '../common/utils/mask.util';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export const CATALOG_MESSAGES = {
  missingCredential:
    'API 키가 설정되지 않았습니다. 환경 변수 YOUTUBE_API_KEY를 설정하세요.',
  timeout: '요청 시간이 초과되었습니다. 잠시 후 다시 시도하세요.',
  network: (cause: string) => `네트워크 오류가 발생했습니다: ${cause}`,
  unexpected: (cause: string) => `알 수 없는 오류가 발생했습니다: ${cause}`,
  upstream: (status: number, message: string) =>
    `YouTube API 오류 (status ${status}): ${message}`,
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** 응답 본문의 items 배열 (없거나 형식이 다르면 빈 배열) */
function readItems<T>(data: unknown): T[] {
  if (!isRecord(data)) return [];
  const items = data.items;
  return Array.isArray(items) ? items : [];
}

/**
 * 오류 응답 본문에서 YouTube 에러 메시지를 꺼낸다.
 * 구조화된 메시지가 없으면 원문 텍스트를 그대로 쓴다.
 */
export function extractUpstreamMessage(body: unknown): string {
  let parsed: unknown = body;
  if (typeof body === 'string') {
    try {
      parsed = JSON.parse(body);
    } catch {
      return body;
    }
  }
  if (isRecord(parsed)) {
    const error = parsed.error;
    if (isRecord(error) && typeof error.message === 'string' && error.message) {
      return error.message;
    }
  }
  if (typeof body === 'string') return body;
  return body == null ? '' : JSON.stringify(body);
}

/**
 * YouTube Data API v3 조회 클라이언트
 *
 * 역할: 인기 동영상 목록 / 카테고리 이름 조회
 * 특징: 요청 1회 (재시도 없음), 10초 타임아웃, 예외 대신 태그드 결과 반환
 */
@Injectable()
export class YouTubeApiService {
  private readonly logger = new Logger(YouTubeApiService.name);
  private readonly defaultRegion: string;

  constructor(
    private readonly httpService: HttpService,
    config: ConfigService,
  ) {
    const configured = (config.get<string>('YOUTUBE_REGION') ?? '').trim();
    this.defaultRegion = configured || DEFAULT_REGION;
  }

  resolveRegion(regionCode?: string | null): string {
    const trimmed = (regionCode ?? '').trim();
    return trimmed || this.defaultRegion;
  }

  /**
   * 인기 동영상 조회
   * API: GET /videos?part=snippet,statistics,contentDetails&chart=mostPopular
   */
  async fetchPopularItems(
    apiKey: string,
    regionCode: string,
    limit: number = YOUTUBE_COLLECTION.maxResults,
  ): Promise<CatalogResponse> {
    if (!apiKey) {
      LoggerHelper.logWarning(this.logger, '인기 동영상 조회', 'API 키 미설정');
      return {
        ok: false,
        message: CATALOG_MESSAGES.missingCredential,
        cause: { kind: 'MISSING_CREDENTIAL' },
      };
    }

    const region = this.resolveRegion(regionCode);
    const started = Date.now();
    LoggerHelper.logStart(this.logger, '인기 동영상 조회', {
      region,
      limit,
      credential: maskKey(apiKey),
    });

    try {
      const response = await firstValueFrom(
        this.httpService.get<YouTubeVideoListResponse>(
          `${YOUTUBE_API_BASE_URL}/videos`,
          {
            params: {
              part: YOUTUBE_COLLECTION.videoParts,
              chart: YOUTUBE_COLLECTION.chart,
              regionCode: region,
              maxResults: limit,
              key: apiKey,
            },
            timeout: YOUTUBE_COLLECTION.timeoutMs,
          },
        ),
      );

      const items = readItems<YouTubeVideoItem>(response.data);

      LoggerHelper.logComplete(
        this.logger,
        '인기 동영상 조회',
        { region, items: items.length },
        Date.now() - started,
      );
      return { ok: true, items };
    } catch (error) {
      const failure = this.toFailure(error);
      LoggerHelper.logError(this.logger, '인기 동영상 조회', failure.message, {
        region,
        kind: failure.cause.kind,
      });
      return failure;
    }
  }

  /**
   * 카테고리 ID → 이름 매핑 (예: {"10": "음악"})
   * 부가 정보이므로 어떤 실패든 빈 매핑으로 대체한다.
   */
  async fetchCategories(apiKey: string, regionCode: string): Promise<CategoryMap> {
    if (!apiKey) return {};

    const region = this.resolveRegion(regionCode);
    try {
      const response = await firstValueFrom(
        this.httpService.get<YouTubeCategoryListResponse>(
          `${YOUTUBE_API_BASE_URL}/videoCategories`,
          {
            params: {
              part: 'snippet',
              regionCode: region,
              key: apiKey,
              hl: YOUTUBE_COLLECTION.categoryLanguage,
            },
            timeout: YOUTUBE_COLLECTION.timeoutMs,
          },
        ),
      );

      const items = readItems<YouTubeCategoryItem>(response.data);

      const mapping: CategoryMap = {};
      for (const item of items) {
        const id = item?.id;
        const name = item?.snippet?.title;
        if (id && name) mapping[id] = name;
      }
      return mapping;
    } catch (error) {
      const failure = this.toFailure(error);
      LoggerHelper.logWarning(
        this.logger,
        '카테고리 조회',
        `빈 매핑으로 대체 - ${failure.message}`,
        { region },
      );
      return {};
    }
  }

  private toFailure(error: unknown): CatalogFailure {
    if (isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;
        const message = extractUpstreamMessage(error.response.data);
        return {
          ok: false,
          message: CATALOG_MESSAGES.upstream(status, message),
          cause: { kind: 'UPSTREAM_STATUS', code: status, message },
        };
      }
      if (error.code && TIMEOUT_CODES.has(error.code)) {
        return {
          ok: false,
          message: CATALOG_MESSAGES.timeout,
          cause: { kind: 'TIMEOUT' },
        };
      }
      return {
        ok: false,
        message: CATALOG_MESSAGES.network(error.message),
        cause: { kind: 'NETWORK', cause: error.message },
      };
    }

    const cause = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      message: CATALOG_MESSAGES.unexpected(cause),
      cause: { kind: 'UNEXPECTED', cause },
    };
  }
}
