import { Logger } from '@nestjs/common';
import { maskSensitive } from './mask.util';

function stringifyContext(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(maskSensitive(value));
  }
  return String(value);
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * 작업 단위 로그 포맷 통일 (시작/완료/경고/실패)
 * - 객체 컨텍스트는 민감 키를 마스킹한 뒤 직렬화한다.
 */
export class LoggerHelper {
  static logStart(logger: Logger, operation: string, context?: unknown): void {
    const contextStr = context !== undefined ? ` (${stringifyContext(context)})` : '';
    logger.log(`${operation} 시작${contextStr}`);
  }

  static logComplete(
    logger: Logger,
    operation: string,
    stats?: Record<string, string | number | boolean>,
    elapsedMs?: number,
  ): void {
    const statsStr = stats
      ? ` - ${Object.entries(stats)
          .map(([key, value]) => `${key}: ${value}`)
          .join(', ')}`
      : '';
    const timeStr = elapsedMs !== undefined ? ` (${elapsedMs}ms)` : '';
    logger.log(`${operation} 완료${statsStr}${timeStr}`);
  }

  static logWarning(
    logger: Logger,
    operation: string,
    reason: string,
    context?: unknown,
  ): void {
    const contextStr = context !== undefined ? ` (${stringifyContext(context)})` : '';
    logger.warn(`${operation} 경고: ${reason}${contextStr}`);
  }

  static logError(
    logger: Logger,
    operation: string,
    error: unknown,
    context?: unknown,
  ): void {
    const contextStr =
      context !== undefined ? ` (컨텍스트: ${stringifyContext(context)})` : '';
    logger.error(`${operation} 실패: ${errorMessage(error)}${contextStr}`);
  }
}
