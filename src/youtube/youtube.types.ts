// src/youtube/youtube.types.ts

/**
 * YouTube Data API v3 원본 응답 타입
 * - 모든 필드는 선택값: 누락은 정상 상태이며 오류가 아니다.
 */

export interface YouTubeThumbnail {
  url?: string | null;
  width?: number | null;
  height?: number | null;
}

export type ThumbnailVariant = 'default' | 'medium' | 'high' | 'standard' | 'maxres';

export type YouTubeThumbnails = Partial<Record<ThumbnailVariant, YouTubeThumbnail | null>>;

export interface YouTubeVideoSnippet {
  title?: string | null;
  channelTitle?: string | null;
  /** ISO8601 UTC (예: 2024-09-01T12:34:56Z) */
  publishedAt?: string | null;
  categoryId?: string | null;
  thumbnails?: YouTubeThumbnails | null;
}

/** 통계 값은 API 에서 문자열 숫자로 내려온다 */
export interface YouTubeVideoStatistics {
  viewCount?: string | number | null;
  likeCount?: string | number | null;
  commentCount?: string | number | null;
}

export interface YouTubeContentDetails {
  /** ISO8601 기간 (예: PT5M32S) */
  duration?: string | null;
}

/** videos.list 단일 아이템 (원본 그대로) */
export interface YouTubeVideoItem {
  id?: string | null;
  snippet?: YouTubeVideoSnippet | null;
  statistics?: YouTubeVideoStatistics | null;
  contentDetails?: YouTubeContentDetails | null;
}

export interface YouTubeVideoListResponse {
  items?: YouTubeVideoItem[] | null;
}

export interface YouTubeCategoryItem {
  id?: string | null;
  snippet?: { title?: string | null } | null;
}

export interface YouTubeCategoryListResponse {
  items?: YouTubeCategoryItem[] | null;
}

/** 카테고리 ID → 현지화된 이름 (예: { "10": "음악" }) */
export type CategoryMap = Record<string, string>;

// ────────────────────────────────────────────────────────────────
// 조회 결과 (태그드 유니온)
// ────────────────────────────────────────────────────────────────

export type CatalogError =
  | { kind: 'MISSING_CREDENTIAL' }
  | { kind: 'UPSTREAM_STATUS'; code: number; message: string }
  | { kind: 'TIMEOUT' }
  | { kind: 'NETWORK'; cause: string }
  | { kind: 'UNEXPECTED'; cause: string };

export type CatalogErrorKind = CatalogError['kind'];

export interface CatalogSuccess {
  ok: true;
  items: YouTubeVideoItem[];
}

export interface CatalogFailure {
  ok: false;
  message: string;
  cause: CatalogError;
}

export type CatalogResponse = CatalogSuccess | CatalogFailure;
