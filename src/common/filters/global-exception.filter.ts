/**
 * 🛡️ 통합 글로벌 Exception Filter
 * 모든 예외를 ApiResponse 형태로 변환한다.
 */

import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { ApiResponse } from '../interfaces/api-response.interface';
import { RequestWithContext } from '../interfaces/request-context.interface';
import { ErrorCodes } from '../errors/error-codes';

interface NormalizedError {
  status: number;
  code: string;
  message: string;
  details?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<RequestWithContext>();
    const response = ctx.getResponse<Response>();
    const path = request.originalUrl || request.url;

    const normalized = this.normalize(exception);

    if (normalized.status >= 500) {
      this.logger.error(
        `${normalized.code}: ${normalized.message}`,
        exception instanceof Error ? exception.stack : undefined,
        `${request.method} ${path}`,
      );
    } else {
      this.logger.warn(
        `${normalized.code}: ${normalized.message} (${request.method} ${path})`,
      );
    }

    const body: ApiResponse<null> = {
      success: false,
      data: null,
      error: {
        code: normalized.code,
        message: normalized.message,
        details: normalized.details,
      },
      timestamp: new Date().toISOString(),
      path,
      requestId: request.requestId,
    };

    response.status(normalized.status).json(body);
  }

  private normalize(exception: unknown): NormalizedError {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const payload = exception.getResponse();

      if (typeof payload === 'string') {
        return { status, code: this.codeFromStatus(status), message: payload };
      }

      if (isRecord(payload)) {
        // ValidationPipe 는 message 를 배열로 준다
        const rawMessage = payload.message;
        const message = Array.isArray(rawMessage)
          ? rawMessage.map(String).join(', ')
          : typeof rawMessage === 'string'
            ? rawMessage
            : exception.message;
        const code =
          typeof payload.code === 'string' ? payload.code : this.codeFromStatus(status);
        return { status, code, message, details: payload.details };
      }

      return { status, code: this.codeFromStatus(status), message: exception.message };
    }

    const message =
      exception instanceof Error ? exception.message : 'Internal server error occurred';
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: ErrorCodes.INTERNAL_SERVER_ERROR,
      message:
        process.env.NODE_ENV === 'production' ? '서버 내부 오류가 발생했습니다.' : message,
    };
  }

  private codeFromStatus(status: number): string {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCodes.VALIDATION_ERROR;
      case HttpStatus.UNAUTHORIZED:
        return ErrorCodes.UNAUTHORIZED;
      case HttpStatus.NOT_FOUND:
        return ErrorCodes.DATA_NOT_FOUND;
      case HttpStatus.GATEWAY_TIMEOUT:
        return ErrorCodes.TIMEOUT_ERROR;
      default:
        return ErrorCodes.INTERNAL_SERVER_ERROR;
    }
  }
}
