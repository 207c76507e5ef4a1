import { Request } from 'express';

export interface AuthSession {
  token: string;
  username: string;
  createdAt: string;
}

/** 미들웨어/가드가 채워 넣는 요청 컨텍스트 */
export interface RequestWithContext extends Request {
  requestId?: string;
  authSession?: AuthSession;
}
