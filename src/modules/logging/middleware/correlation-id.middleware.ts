import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { loggingContext } from '../logging.context';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * CorrelationIdMiddleware
 *
 * Reuses the caller's x-request-id header when present, otherwise generates
 * a UUID v4, echoes it on the response and runs the rest of the request
 * inside the logging context.
 */
@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const header = req.headers[REQUEST_ID_HEADER];
    const incoming = Array.isArray(header) ? header[0] : header;
    const requestId = incoming && incoming.trim() ? incoming.trim() : uuidv4();

    res.setHeader(REQUEST_ID_HEADER, requestId);

    loggingContext.run({ requestId }, () => {
      next();
    });
  }
}
