import { Inject, Injectable, Optional } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { AuthSession } from '../common/interfaces/request-context.interface';
import { Clock, TtlCache } from '../common/cache/ttl-cache';

export const SESSION_CLOCK = Symbol('SESSION_CLOCK');

// 세션 유효 시간 12시간, 최대 1000개 (초과 시 가장 오래된 세션부터 만료)
export const SESSION_POLICY = {
  ttlMs: 12 * 60 * 60 * 1000,
  max: 1000,
} as const;

/**
 * 세션 저장소 (프로세스 메모리)
 * 로그인 상태는 토큰 단위로 분리되어 다른 세션에 영향을 주지 않는다.
 */
@Injectable()
export class SessionStore {
  private readonly sessions: TtlCache<AuthSession>;
  private readonly clock: Clock;

  constructor(@Optional() @Inject(SESSION_CLOCK) clock?: Clock) {
    this.clock = clock ?? Date.now;
    this.sessions = new TtlCache<AuthSession>({
      ttlMs: SESSION_POLICY.ttlMs,
      max: SESSION_POLICY.max,
      clock: this.clock,
    });
  }

  create(username: string): AuthSession {
    const session: AuthSession = {
      token: randomUUID(),
      username,
      createdAt: new Date(this.clock()).toISOString(),
    };
    this.sessions.set(session.token, session);
    return session;
  }

  get(token: string): AuthSession | null {
    return this.sessions.get(token) ?? null;
  }

  revoke(token: string): boolean {
    return this.sessions.delete(token);
  }
}
