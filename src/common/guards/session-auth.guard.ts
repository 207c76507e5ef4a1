import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { AuthService } from '../../auth/auth.service';
import { RequestWithContext } from '../interfaces/request-context.interface';

export const SESSION_HEADER = 'x-session-token';

function normalizeHeaderValue(value: string | string[] | undefined): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  if (typeof first !== 'string') return null;
  const trimmed = first.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** x-session-token 헤더 → Authorization: Bearer 순으로 토큰을 찾는다 */
export function extractSessionToken(request: RequestWithContext): string | null {
  const headerToken = normalizeHeaderValue(request.headers[SESSION_HEADER]);
  if (headerToken) return headerToken;

  const authorization = normalizeHeaderValue(request.headers.authorization);
  if (authorization && /^bearer\s+/i.test(authorization)) {
    const token = authorization.replace(/^bearer\s+/i, '').trim();
    return token || null;
  }
  return null;
}

@Injectable()
export class SessionAuthGuard implements CanActivate {
  constructor(private readonly authService: AuthService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<RequestWithContext>();
    const session = this.authService.authenticate(extractSessionToken(request));
    if (session) request.authSession = session;
    return true;
  }
}
