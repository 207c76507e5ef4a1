// src/videos/videos.types.ts

/**
 * 화면 표시용 동영상 레코드
 * - formatted 필드는 항상 표시 가능한 문자열 (누락 시 "-" 등)
 */
export interface DisplayRecord {
  id: string;
  title: string;
  channelName: string;
  /** 검색용 원본 값 (누락 → null) */
  titleRaw: string | null;
  channelNameRaw: string | null;
  thumbnailUrl: string | null;
  /** 필터용 원시 조회수 (누락/비정상 → 0) */
  viewCountRaw: number;
  viewCountFormatted: string;
  likeCountFormatted: string;
  commentCountFormatted: string;
  durationFormatted: string;
  publishedRelativeFormatted: string;
  categoryId: string | null;
  categoryName: string;
}

export interface ViewCountRange {
  min: number;
  max: number;
}

/** 요청마다 새로 만들어지는 필터 상태 (저장하지 않음) */
export interface FilterState {
  searchText: string;
  selectedCategoryIds: ReadonlySet<string>;
  /** 미지정 시 범위 조건 없음 */
  viewCountRange: ViewCountRange | null;
}

export interface CategoryOption {
  id: string;
  name: string;
}

export interface ViewRangeBounds extends ViewCountRange {
  step: number;
}

export interface FilterOptions {
  categories: CategoryOption[];
  viewRange: ViewRangeBounds;
}

/** 응답용 레코드 (순번 + 시청 URL) */
export interface VideoListEntry extends DisplayRecord {
  rank: number;
  watchUrl: string;
}

export interface AppliedFilters {
  searchText: string;
  categoryIds: string[];
  viewCountRange: ViewCountRange;
}

export interface PopularVideosOk {
  status: 'ok';
  region: string;
  totalCount: number;
  filteredCount: number;
  summary: string;
  filters: AppliedFilters;
  options: FilterOptions;
  items: VideoListEntry[];
}

export interface PopularVideosEmpty {
  status: 'empty';
  region: string;
  message: string;
}

export type PopularVideosView = PopularVideosOk | PopularVideosEmpty;
