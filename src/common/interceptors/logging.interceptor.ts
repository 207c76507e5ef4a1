import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Response } from 'express';
import { Observable, tap } from 'rxjs';
import { maskSensitive } from '../utils/mask.util';
import { RequestWithContext } from '../interfaces/request-context.interface';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const t0 = Date.now();
    const ctx = context.switchToHttp();
    const req = ctx.getRequest<RequestWithContext>();
    const res = ctx.getResponse<Response>();

    const url = req.originalUrl || req.url;
    const pfx = `[#${req.requestId ?? '-'}] ${req.method} ${url}`;

    this.logger.debug(`${pfx} ▶️ 요청 | query=${JSON.stringify(maskSensitive(req.query))}`);

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(`${pfx} ✅ 응답 | status=${res.statusCode} | ${Date.now() - t0}ms`);
        },
        error: (err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          this.logger.error(`${pfx} ❌ 에러 | ${Date.now() - t0}ms | ${message}`);
        },
      }),
    );
  }
}
