/**
 * 통계 수치 포맷 유틸리티
 * API 통계 값은 문자열 숫자("12543")로 오며, 누락/비정상 값은 표시용 기호로 대체한다.
 */

export type CountInput = string | number | null | undefined;

export const NO_VIEW_DATA = '조회수 정보 없음';
export const NO_COUNT = '-';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/** 정수로 해석 가능한 값만 숫자로, 나머지는 null */
export function parseCount(value: CountInput): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) ? n : null;
}

/** 필터/정렬용 원시 조회수 (해석 불가 시 0) */
export function toViewCount(value: CountInput): number {
  return parseCount(value) ?? 0;
}

/** 12543 → "12,543회" */
export function formatViews(value: CountInput): string {
  const n = parseCount(value);
  if (n === null) return NO_VIEW_DATA;
  return `${n.toLocaleString('en-US')}회`;
}

function oneDecimal(n: number, unit: number): string {
  const text = (n / unit).toFixed(1);
  return text.endsWith('.0') ? text.slice(0, -2) : text;
}

/**
 * 한국어 축약 표기 (천/만/억)
 * 예) 999 → "999", 1000 → "1천", 12543 → "1.3만", 250000000 → "2.5억"
 */
export function formatCompactKorean(value: CountInput): string {
  const n = parseCount(value);
  if (n === null) return NO_COUNT;
  if (n >= 100_000_000) return `${oneDecimal(n, 100_000_000)}억`;
  if (n >= 10_000) return `${oneDecimal(n, 10_000)}만`;
  if (n >= 1_000) return `${oneDecimal(n, 1_000)}천`;
  return `${n}`;
}
