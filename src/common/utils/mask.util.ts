const SENSITIVE_KEYS = [
  'password',
  'pw',
  'token',
  'authorization',
  'apikey',
  'key',
  'secret',
  'cookie',
  'set-cookie',
  'x-session-token',
];

export const MASKED = '[masked]';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 로그 출력 전 민감 필드 마스킹 (깊이 4 까지) */
export function maskSensitive(value: unknown, depth = 0): unknown {
  if (value == null) return value;
  if (depth > 4) return '[truncated]';
  if (Array.isArray(value)) return value.map((v) => maskSensitive(v, depth + 1));
  if (isPlainRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (SENSITIVE_KEYS.includes(k.toLowerCase())) out[k] = MASKED;
      else out[k] = maskSensitive(v, depth + 1);
    }
    return out;
  }
  return value;
}

/** API 키 앞 4자리만 남긴다 (예: abcd****) */
export function maskKey(key: string): string {
  if (!key) return '(empty)';
  if (key.length <= 4) return '****';
  return `${key.slice(0, 4)}****`;
}
