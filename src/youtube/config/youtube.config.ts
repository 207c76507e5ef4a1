// src/youtube/config/youtube.config.ts
// ✅ YouTube 조회 정책/상수를 단일 소스로 관리
export const YOUTUBE_API_BASE_URL = 'https://www.googleapis.com/youtube/v3';
export const YOUTUBE_WATCH_URL = 'https://www.youtube.com/watch?v=';

export const DEFAULT_REGION = 'KR';

export const YOUTUBE_COLLECTION = {
  maxResults: 30,
  timeoutMs: 10_000,
  // 카테고리 이름은 한국어로 요청
  categoryLanguage: 'ko',
  videoParts: 'snippet,statistics,contentDetails',
  chart: 'mostPopular',
} as const;

// 인기 순위는 자주 바뀌고, 카테고리 체계는 거의 바뀌지 않는다
export const YOUTUBE_CACHE_TTL = {
  popularMs: 300 * 1000,
  categoriesMs: 3600 * 1000,
} as const;
