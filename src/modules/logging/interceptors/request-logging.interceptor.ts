import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
} from '@nestjs/common';
import { Observable, throwError } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { Request, Response } from 'express';
import { LoggingService } from '../logging.service';
import { getRequestId } from '../logging.context';

/**
 * RequestLoggingInterceptor
 *
 * Logs every HTTP request on completion or failure with method, path,
 * status code, duration, request ID and, once authenticated, the member ID.
 * Skips /health.
 */
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private static readonly SKIP_PATHS = ['/health', '/api/health'];

  constructor(private readonly loggingService: LoggingService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const path = request.path || request.url;

    if (
      RequestLoggingInterceptor.SKIP_PATHS.some(
        (skip) => path === skip || path.startsWith(skip + '/'),
      )
    ) {
      return next.handle();
    }

    const method = request.method;
    const startTime = Date.now();
    const requestId = getRequestId();
    // request.user is set by the JWT guard, which runs before interceptors
    const memberId = this.extractMemberId(request.user);

    this.loggingService.log(`Incoming request ${method} ${path}`, 'RequestLoggingInterceptor');

    return next.handle().pipe(
      tap(() => {
        const response = httpContext.getResponse<Response>();

        this.loggingService.log(
          {
            message: `Request completed ${method} ${path}`,
            method,
            path,
            statusCode: response.statusCode,
            duration: Date.now() - startTime,
            requestId,
            memberId,
          },
          'RequestLoggingInterceptor',
        );
      }),
      catchError((error: unknown) => {
        const statusCode = error instanceof HttpException ? error.getStatus() : 500;

        this.loggingService.error(
          {
            message: `Request failed ${method} ${path}`,
            method,
            path,
            statusCode,
            duration: Date.now() - startTime,
            requestId,
            memberId,
            error: error instanceof Error ? error.message : String(error),
          },
          error instanceof Error ? error.stack : undefined,
          'RequestLoggingInterceptor',
        );

        return throwError(() => error);
      }),
    );
  }

  private extractMemberId(user: unknown): string | undefined {
    if (typeof user === 'object' && user !== null && 'id' in user && typeof user.id === 'string') {
      return user.id;
    }
    return undefined;
  }
}
