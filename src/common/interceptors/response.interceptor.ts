import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable, map } from 'rxjs';
import { ApiResponse } from '../interfaces/api-response.interface';
import { RequestWithContext } from '../interfaces/request-context.interface';

@Injectable()
export class ResponseTransformInterceptor<T>
  implements NestInterceptor<T, ApiResponse<T>>
{
  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiResponse<T>> {
    const req = context.switchToHttp().getRequest<RequestWithContext>();
    const path = req.originalUrl || req.url;
    const t0 = Date.now();

    return next.handle().pipe(
      map((data) => ({
        success: true,
        data,
        message: 'OK',
        error: null,
        timestamp: new Date().toISOString(),
        path,
        requestId: req.requestId,
        meta: { elapsedMs: Date.now() - t0 },
      })),
    );
  }
}
