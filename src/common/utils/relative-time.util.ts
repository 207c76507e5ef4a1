import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);

// 오프셋 없는 값은 UTC 로 간주한다
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

/** ISO8601 시각 → epoch ms (해석 불가 시 null) */
export function parseIsoInstant(iso: string | null | undefined): number | null {
  if (!iso || !ISO_DATE_PREFIX.test(iso.trim())) return null;
  const parsed = dayjs.utc(iso.trim());
  return parsed.isValid() ? parsed.valueOf() : null;
}

/**
 * 게시 시각을 "n일 전" 형태로 표시
 * 예) 2024-09-01T12:34:56Z → "3일 전"
 */
export function formatRelativeTimeKorean(
  iso: string | null | undefined,
  now: Date = new Date(),
): string {
  const at = parseIsoInstant(iso);
  if (at === null) return '-';

  const seconds = Math.trunc((now.getTime() - at) / 1000);
  if (seconds < 60) return '방금 전';

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}분 전`;

  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}시간 전`;

  const days = Math.floor(hours / 24);
  if (days < 7) return `${days}일 전`;

  const weeks = Math.floor(days / 7);
  if (weeks < 5) return `${weeks}주 전`;

  const months = Math.floor(days / 30);
  if (months < 12) return `${months}개월 전`;

  return `${Math.floor(days / 365)}년 전`;
}
