import { Global, Module } from '@nestjs/common';
import { LoggingService } from './logging.service';
import { CorrelationIdMiddleware } from './middleware/correlation-id.middleware';
import { RequestLoggingInterceptor } from './interceptors/request-logging.interceptor';

/**
 * LoggingModule
 *
 * Global module providing structured logging via Winston.
 *
 * Provides:
 * - LoggingService: Winston-based implementation of Nest's LoggerService
 * - CorrelationIdMiddleware: request ID generation/propagation
 * - RequestLoggingInterceptor: HTTP request/response logging
 */
@Global()
@Module({
  providers: [LoggingService, CorrelationIdMiddleware, RequestLoggingInterceptor],
  exports: [LoggingService, CorrelationIdMiddleware, RequestLoggingInterceptor],
})
export class LoggingModule {}
