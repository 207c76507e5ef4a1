import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuthSettings, loadAuthSettings } from './auth.config';
import { SessionStore } from './session.store';
import { AuthSession } from '../common/interfaces/request-context.interface';
import { ErrorCodes } from '../common/errors/error-codes';
import { LoggerHelper } from '../common/utils/logger.helper';

export const AUTH_MESSAGES = {
  invalidCredentials: '아이디 또는 비밀번호가 올바르지 않습니다.',
  loginRequired: '로그인이 필요합니다.',
} as const;

/**
 * 간단 로그인 게이트
 * 설정된 사용자/비밀번호 매핑과 단순 비교한다.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly settings: AuthSettings;

  constructor(
    config: ConfigService,
    private readonly sessions: SessionStore,
  ) {
    this.settings = loadAuthSettings((key) => config.get<string>(key));
    if (this.settings.enabled && Object.keys(this.settings.users).length === 0) {
      this.logger.warn('⚠️ AUTH_ENABLED 이지만 AUTH_USERS 가 비어 있습니다. 아무도 로그인할 수 없습니다.');
    }
  }

  isEnabled(): boolean {
    return this.settings.enabled;
  }

  login(username: string, password: string): AuthSession {
    const expected = this.settings.users[username];
    if (expected === undefined || expected !== password) {
      LoggerHelper.logWarning(this.logger, '로그인', '인증 실패', { username });
      throw new UnauthorizedException({
        code: ErrorCodes.INVALID_CREDENTIALS,
        message: AUTH_MESSAGES.invalidCredentials,
      });
    }

    const session = this.sessions.create(username);
    LoggerHelper.logComplete(this.logger, '로그인', { username });
    return session;
  }

  logout(token: string | null): boolean {
    if (!token) return false;
    return this.sessions.revoke(token);
  }

  /** 게이트가 꺼져 있으면 항상 통과 (세션 null) */
  authenticate(token: string | null): AuthSession | null {
    if (!this.settings.enabled) return null;
    const session = token ? this.sessions.get(token) : null;
    if (!session) {
      throw new UnauthorizedException({
        code: ErrorCodes.UNAUTHORIZED,
        message: AUTH_MESSAGES.loginRequired,
      });
    }
    return session;
  }
}
