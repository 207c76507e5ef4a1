import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { UnauthorizedException } from '@nestjs/common';
import { AUTH_MESSAGES, AuthService } from '../../../src/auth/auth.service';
import {
  SESSION_CLOCK,
  SESSION_POLICY,
  SessionStore,
} from '../../../src/auth/session.store';
import { parseEnabled, parseUsers } from '../../../src/auth/auth.config';
import { ErrorCodes } from '../../../src/common/errors/error-codes';

describe('auth.config', () => {
  it('AUTH_ENABLED 는 true/1/yes 만 켜짐', () => {
    expect(parseEnabled('true')).toBe(true);
    expect(parseEnabled(' YES ')).toBe(true);
    expect(parseEnabled('1')).toBe(true);
    expect(parseEnabled('false')).toBe(false);
    expect(parseEnabled(undefined)).toBe(false);
  });

  it('AUTH_USERS 는 첫 번째 ":" 기준으로 나누고 빈 항목은 버린다', () => {
    expect(parseUsers('demo:demo123, alice:pa:ss ,broken,:nouser,nopass:')).toEqual({
      demo: 'demo123',
      alice: 'pa:ss',
    });
    expect(parseUsers(undefined)).toEqual({});
  });
});

describe('AuthService', () => {
  let service: AuthService;
  let now: number;

  beforeEach(() => {
    now = Date.parse('2025-06-15T00:00:00Z');
  });

  const build = async (env: Record<string, string | undefined>) => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        AuthService,
        SessionStore,
        { provide: SESSION_CLOCK, useValue: () => now },
        { provide: ConfigService, useValue: { get: (key: string) => env[key] } },
      ],
    }).compile();
    service = moduleRef.get(AuthService);
  };

  describe('게이트 비활성', () => {
    beforeEach(async () => {
      await build({});
    });

    it('토큰 없이도 통과한다', () => {
      expect(service.isEnabled()).toBe(false);
      expect(service.authenticate(null)).toBeNull();
    });
  });

  describe('게이트 활성', () => {
    beforeEach(async () => {
      await build({ AUTH_ENABLED: 'true', AUTH_USERS: 'demo:test-password' });
    });

    it('올바른 자격 증명이면 세션 발급', () => {
      const session = service.login('demo', 'test-password');

      expect(session.username).toBe('demo');
      expect(session.token).toEqual(expect.any(String));
      expect(service.authenticate(session.token)).toEqual(session);
    });

    it('잘못된 비밀번호/사용자는 INVALID_CREDENTIALS', () => {
      for (const [user, pw] of [
        ['demo', 'wrong'],
        ['ghost', 'test-password'],
      ]) {
        try {
          service.login(user, pw);
          throw new Error('expected login to fail');
        } catch (error) {
          expect(error).toBeInstanceOf(UnauthorizedException);
          if (!(error instanceof UnauthorizedException)) return;
          expect(error.getResponse()).toEqual({
            code: ErrorCodes.INVALID_CREDENTIALS,
            message: AUTH_MESSAGES.invalidCredentials,
          });
        }
      }
    });

    it('세션이 없으면 로그인 필요', () => {
      expect(() => service.authenticate(null)).toThrow(UnauthorizedException);
      expect(() => service.authenticate('unknown-token')).toThrow(AUTH_MESSAGES.loginRequired);
    });

    it('세션은 토큰 단위로 분리되고 로그아웃은 자기 세션만 끝낸다', () => {
      const first = service.login('demo', 'test-password');
      const second = service.login('demo', 'test-password');

      expect(first.token).not.toBe(second.token);
      expect(service.logout(first.token)).toBe(true);
      expect(() => service.authenticate(first.token)).toThrow(UnauthorizedException);
      expect(service.authenticate(second.token)).toEqual(second);
      expect(service.logout(first.token)).toBe(false);
      expect(service.logout(null)).toBe(false);
    });

    it('세션은 유효 시간이 지나면 만료된다', () => {
      const session = service.login('demo', 'test-password');
      expect(session.createdAt).toBe('2025-06-15T00:00:00.000Z');

      now += SESSION_POLICY.ttlMs - 1;
      expect(service.authenticate(session.token)).toEqual(session);

      now += 1;
      expect(() => service.authenticate(session.token)).toThrow(UnauthorizedException);
      expect(service.logout(session.token)).toBe(false);
    });

    it('최대 개수를 넘으면 가장 오래된 세션부터 만료', () => {
      const first = service.login('demo', 'test-password');
      for (let i = 0; i < SESSION_POLICY.max; i++) {
        service.login('demo', 'test-password');
      }

      expect(() => service.authenticate(first.token)).toThrow(UnauthorizedException);
    });
  });
});
