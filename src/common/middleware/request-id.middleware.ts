import { Injectable, NestMiddleware } from '@nestjs/common';
import { Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { RequestWithContext } from '../interfaces/request-context.interface';

export const REQ_ID_HEADER = 'x-request-id';

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(req: RequestWithContext, res: Response, next: NextFunction): void {
    const existing = req.header(REQ_ID_HEADER)?.trim();
    const id = existing || randomUUID();
    req.requestId = id;
    res.setHeader(REQ_ID_HEADER, id);
    next();
  }
}
