import {
  CategoryMap,
  ThumbnailVariant,
  YouTubeContentDetails,
  YouTubeVideoItem,
  YouTubeVideoSnippet,
  YouTubeVideoStatistics,
} from '../../youtube/youtube.types';
import { DisplayRecord } from '../videos.types';
import {
  formatCompactKorean,
  formatViews,
  toViewCount,
} from '../../common/utils/count-format.util';
import { formatIsoDuration } from '../../common/utils/duration-format.util';
import { formatRelativeTimeKorean } from '../../common/utils/relative-time.util';

export const TITLE_FALLBACK = '제목 없음';
export const CHANNEL_FALLBACK = '채널 정보 없음';
export const CATEGORY_FALLBACK = '-';

// 썸네일 우선순위: medium → high → standard → default
const THUMBNAIL_PRIORITY: readonly ThumbnailVariant[] = [
  'medium',
  'high',
  'standard',
  'default',
];

// ===== 원본 필드 접근자 (누락 → null) =====

function nonEmpty(value: string | null | undefined): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function snippetOf(item: YouTubeVideoItem): YouTubeVideoSnippet {
  return item.snippet ?? {};
}

export function statisticsOf(item: YouTubeVideoItem): YouTubeVideoStatistics {
  return item.statistics ?? {};
}

export function contentDetailsOf(item: YouTubeVideoItem): YouTubeContentDetails {
  return item.contentDetails ?? {};
}

export function categoryIdOf(item: YouTubeVideoItem): string | null {
  return nonEmpty(snippetOf(item).categoryId);
}

// ===== 리졸버 =====

export function resolveThumbnailUrl(item: YouTubeVideoItem): string | null {
  const thumbnails = snippetOf(item).thumbnails;
  if (!thumbnails) return null;
  for (const variant of THUMBNAIL_PRIORITY) {
    const url = nonEmpty(thumbnails[variant]?.url);
    if (url) return url;
  }
  return null;
}

/** 매핑에 없으면 "ID <id>" 로 표시 */
export function resolveCategoryName(
  categoryId: string | null,
  categories: CategoryMap,
): string {
  if (!categoryId) return CATEGORY_FALLBACK;
  return categories[categoryId] ?? `ID ${categoryId}`;
}

/**
 * 원본 아이템 → 표시용 레코드
 * 모든 필드가 선택값이므로 어떤 입력에서도 예외 없이 레코드를 만든다.
 */
export function toDisplayRecord(
  item: YouTubeVideoItem,
  categories: CategoryMap,
  now: Date = new Date(),
): DisplayRecord {
  const snippet = snippetOf(item);
  const stats = statisticsOf(item);
  const categoryId = categoryIdOf(item);
  const titleRaw = nonEmpty(snippet.title);
  const channelNameRaw = nonEmpty(snippet.channelTitle);

  return {
    id: item.id ?? '',
    title: titleRaw ?? TITLE_FALLBACK,
    channelName: channelNameRaw ?? CHANNEL_FALLBACK,
    titleRaw,
    channelNameRaw,
    thumbnailUrl: resolveThumbnailUrl(item),
    viewCountRaw: toViewCount(stats.viewCount),
    viewCountFormatted: formatViews(stats.viewCount),
    likeCountFormatted: formatCompactKorean(stats.likeCount),
    commentCountFormatted: formatCompactKorean(stats.commentCount),
    durationFormatted: formatIsoDuration(contentDetailsOf(item).duration),
    publishedRelativeFormatted: formatRelativeTimeKorean(snippet.publishedAt, now),
    categoryId,
    categoryName: resolveCategoryName(categoryId, categories),
  };
}

export function normalizeItems(
  items: readonly YouTubeVideoItem[],
  categories: CategoryMap,
  now: Date = new Date(),
): DisplayRecord[] {
  return items.map((item) => toDisplayRecord(item, categories, now));
}
