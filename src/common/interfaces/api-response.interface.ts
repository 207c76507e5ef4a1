/**
 * 🎯 표준 API 응답 인터페이스
 * 성공/실패 모두 같은 껍데기로 내려간다.
 */

export interface ApiErrorBody {
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data: T | null;
  message?: string;
  error: ApiErrorBody | null;
  timestamp: string;
  path: string;
  requestId?: string;
  meta?: { elapsedMs: number };
}
