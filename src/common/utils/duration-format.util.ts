/**
 * ISO8601 기간(PT[nH][nM][nS]) → "H:MM:SS" / "M:SS"
 *
 * 일(D)/주(W)/소수 초 등 다른 형태는 모두 "-" 로 처리한다.
 */

export interface DurationParts {
  hours: number;
  minutes: number;
  seconds: number;
}

const UNITS = ['H', 'M', 'S'] as const;
type Unit = (typeof UNITS)[number];

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function unitIndex(ch: string): number {
  return UNITS.findIndex((u) => u === ch);
}

/** 문법: "PT" (숫자+ "H")? (숫자+ "M")? (숫자+ "S")? — 불일치 시 null */
export function parseIsoDuration(input: string | null | undefined): DurationParts | null {
  if (!input || !input.startsWith('PT')) return null;

  const values: Record<Unit, number> = { H: 0, M: 0, S: 0 };
  let pos = 2;
  let lastUnit = -1;

  while (pos < input.length) {
    const start = pos;
    while (pos < input.length && isDigit(input[pos])) pos++;
    if (pos === start || pos >= input.length) return null;

    const idx = unitIndex(input[pos]);
    // 단위는 H → M → S 순서로 한 번씩만
    if (idx <= lastUnit) return null;

    values[UNITS[idx]] = Number(input.slice(start, pos));
    lastUnit = idx;
    pos++;
  }

  return { hours: values.H, minutes: values.M, seconds: values.S };
}

const pad2 = (n: number) => String(n).padStart(2, '0');

export function formatIsoDuration(input: string | null | undefined): string {
  const parts = parseIsoDuration(input);
  if (!parts) return '-';

  const { hours, minutes, seconds } = parts;
  const total = hours * 3600 + minutes * 60 + seconds;
  if (total <= 0) return '-';

  if (hours > 0) return `${hours}:${pad2(minutes)}:${pad2(seconds)}`;
  return `${minutes}:${pad2(seconds)}`;
}
