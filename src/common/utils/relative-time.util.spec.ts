import { formatRelativeTimeKorean, parseIsoInstant } from './relative-time.util';

describe('relative-time.util', () => {
  const now = new Date('2025-06-15T12:00:00Z');
  const ago = (seconds: number) => new Date(now.getTime() - seconds * 1000).toISOString();

  it('60초 미만은 "방금 전"', () => {
    expect(formatRelativeTimeKorean(ago(30), now)).toBe('방금 전');
    expect(formatRelativeTimeKorean(ago(0), now)).toBe('방금 전');
  });

  it('미래 시각도 "방금 전"', () => {
    expect(formatRelativeTimeKorean('2025-06-16T00:00:00Z', now)).toBe('방금 전');
  });

  it('분/시간/일/주/개월/년 단위', () => {
    expect(formatRelativeTimeKorean(ago(90), now)).toBe('1분 전');
    expect(formatRelativeTimeKorean(ago(59 * 60), now)).toBe('59분 전');
    expect(formatRelativeTimeKorean(ago(3 * 3600), now)).toBe('3시간 전');
    expect(formatRelativeTimeKorean(ago(25 * 3600), now)).toBe('1일 전');
    expect(formatRelativeTimeKorean(ago(8 * 86400), now)).toBe('1주 전');
    expect(formatRelativeTimeKorean(ago(40 * 86400), now)).toBe('1개월 전');
    expect(formatRelativeTimeKorean(ago(400 * 86400), now)).toBe('1년 전');
  });

  it('명시적 오프셋을 반영한다', () => {
    // 2025-06-15T20:00:00+09:00 == 11:00Z → 1시간 전
    expect(formatRelativeTimeKorean('2025-06-15T20:00:00+09:00', now)).toBe('1시간 전');
  });

  it('오프셋이 없으면 UTC 로 본다', () => {
    expect(formatRelativeTimeKorean('2025-06-15T10:00:00', now)).toBe('2시간 전');
  });

  it('해석 불가/누락은 "-"', () => {
    expect(formatRelativeTimeKorean(undefined, now)).toBe('-');
    expect(formatRelativeTimeKorean('', now)).toBe('-');
    expect(formatRelativeTimeKorean('yesterday', now)).toBe('-');
    expect(parseIsoInstant('2025-13-45T00:00:00Z')).toBeNull();
  });
});
