// src/auth/auth.config.ts
// 로그인 게이트 설정 파싱 (AUTH_ENABLED / AUTH_USERS)

export interface AuthSettings {
  enabled: boolean;
  /** 아이디 → 비밀번호 */
  users: Record<string, string>;
}

export function parseEnabled(raw: string | undefined): boolean {
  const value = (raw ?? '').trim().toLowerCase();
  return value === 'true' || value === '1' || value === 'yes';
}

/**
 * "demo:demo123,alice:pw" → { demo: "demo123", alice: "pw" }
 * 비밀번호에 ':' 가 들어갈 수 있으므로 첫 번째 ':' 기준으로만 나눈다.
 */
export function parseUsers(raw: string | undefined): Record<string, string> {
  const users: Record<string, string> = {};
  for (const pair of (raw ?? '').split(',')) {
    const idx = pair.indexOf(':');
    if (idx <= 0) continue;
    const username = pair.slice(0, idx).trim();
    const password = pair.slice(idx + 1).trim();
    if (username && password) users[username] = password;
  }
  return users;
}

export function loadAuthSettings(get: (key: string) => string | undefined): AuthSettings {
  return {
    enabled: parseEnabled(get('AUTH_ENABLED')),
    users: parseUsers(get('AUTH_USERS')),
  };
}
