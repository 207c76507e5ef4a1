import { CategoryMap } from '../../youtube/youtube.types';
import {
  DisplayRecord,
  FilterOptions,
  FilterState,
  ViewCountRange,
  ViewRangeBounds,
} from '../videos.types';
import { resolveCategoryName } from './video-normalizer.util';

/** 조회수 슬라이더 최소 상한 / 간격 */
export const VIEW_RANGE_FLOOR = 1000;
export const VIEW_RANGE_STEP = 1000;

export function createEmptyFilterState(): FilterState {
  return {
    searchText: '',
    selectedCategoryIds: new Set<string>(),
    viewCountRange: null,
  };
}

// 대체 문구("제목 없음" 등)가 아닌 원본 제목/채널명으로 비교한다
function matchesText(record: DisplayRecord, query: string): boolean {
  if (!query) return true;
  return (
    (record.titleRaw ?? '').toLowerCase().includes(query) ||
    (record.channelNameRaw ?? '').toLowerCase().includes(query)
  );
}

function matchesCategory(
  record: DisplayRecord,
  selected: ReadonlySet<string>,
): boolean {
  if (selected.size === 0) return true;
  return record.categoryId !== null && selected.has(record.categoryId);
}

function matchesRange(
  record: DisplayRecord,
  range: ViewCountRange | null,
): boolean {
  if (!range) return true;
  return record.viewCountRaw >= range.min && record.viewCountRaw <= range.max;
}

/**
 * 검색어 · 카테고리 · 조회수 범위 조건을 모두 만족하는 레코드만 남긴다.
 * 입력 순서를 유지하며 상태를 갖지 않는다.
 */
export function filterRecords(
  records: readonly DisplayRecord[],
  state: FilterState,
): DisplayRecord[] {
  const query = state.searchText.trim().toLowerCase();
  return records.filter(
    (record) =>
      matchesText(record, query) &&
      matchesCategory(record, state.selectedCategoryIds) &&
      matchesRange(record, state.viewCountRange),
  );
}

/**
 * 필터 선택지
 * - 카테고리: 현재 결과에 실제로 등장한 ID 만 (ID 문자열 순)
 * - 조회수 범위: [0, max(1000, 최대 조회수)]
 */
export function buildFilterOptions(
  records: readonly DisplayRecord[],
  categories: CategoryMap,
): FilterOptions {
  const presentIds = new Set<string>();
  let maxViews = 0;
  for (const record of records) {
    if (record.categoryId) presentIds.add(record.categoryId);
    if (record.viewCountRaw > maxViews) maxViews = record.viewCountRaw;
  }

  return {
    categories: [...presentIds].sort().map((id) => ({
      id,
      name: resolveCategoryName(id, categories),
    })),
    viewRange: {
      min: 0,
      max: Math.max(VIEW_RANGE_FLOOR, maxViews),
      step: VIEW_RANGE_STEP,
    },
  };
}

/**
 * 필터 조건용 조회수 범위
 * 지정하지 않은 쪽만 선택지 경계로 채우고, 지정한 값은 그대로 쓴다 (min > max 이면 결과 없음).
 */
export function resolveViewRange(
  bounds: ViewRangeBounds,
  min?: number,
  max?: number,
): ViewCountRange {
  return {
    min: min ?? bounds.min,
    max: max ?? bounds.max,
  };
}
