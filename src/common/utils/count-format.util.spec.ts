import {
  NO_COUNT,
  NO_VIEW_DATA,
  formatCompactKorean,
  formatViews,
  parseCount,
  toViewCount,
} from './count-format.util';

describe('count-format.util', () => {
  describe('parseCount', () => {
    it('정수 문자열과 숫자를 해석한다', () => {
      expect(parseCount('12543')).toBe(12543);
      expect(parseCount(' 42 ')).toBe(42);
      expect(parseCount(7)).toBe(7);
    });

    it('누락/비정상 값은 null', () => {
      expect(parseCount(undefined)).toBeNull();
      expect(parseCount(null)).toBeNull();
      expect(parseCount('')).toBeNull();
      expect(parseCount('12.5')).toBeNull();
      expect(parseCount('abc')).toBeNull();
      expect(parseCount(1.5)).toBeNull();
    });

    it('toViewCount 는 해석 불가 시 0', () => {
      expect(toViewCount(undefined)).toBe(0);
      expect(toViewCount('n/a')).toBe(0);
      expect(toViewCount('1500')).toBe(1500);
    });
  });

  describe('formatViews', () => {
    it('천 단위 구분 + "회"', () => {
      expect(formatViews('1234567')).toBe('1,234,567회');
      expect(formatViews(0)).toBe('0회');
      expect(formatViews('999')).toBe('999회');
    });

    it('누락/비정상 값은 안내 문구', () => {
      expect(formatViews(undefined)).toBe(NO_VIEW_DATA);
      expect(formatViews('many')).toBe(NO_VIEW_DATA);
    });
  });

  describe('formatCompactKorean', () => {
    it.each([
      [0, '0'],
      [999, '999'],
      [1000, '1천'],
      [1500, '1.5천'],
      [12543, '1.3만'],
      [100000000, '1억'],
      [250000000, '2.5억'],
    ])('%p → %p', (input, expected) => {
      expect(formatCompactKorean(input)).toBe(expected);
    });

    it('문자열 입력도 같은 규칙', () => {
      expect(formatCompactKorean('10000')).toBe('1만');
    });

    it('누락/비정상 값은 "-"', () => {
      expect(formatCompactKorean(undefined)).toBe(NO_COUNT);
      expect(formatCompactKorean(null)).toBe(NO_COUNT);
      expect(formatCompactKorean('x')).toBe(NO_COUNT);
    });
  });
});
