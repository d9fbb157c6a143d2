export { LoggingModule } from './logging.module';
export { LoggingService } from './logging.service';
export { CorrelationIdMiddleware, REQUEST_ID_HEADER } from './middleware/correlation-id.middleware';
export { RequestLoggingInterceptor } from './interceptors/request-logging.interceptor';
export { loggingContext, getRequestId } from './logging.context';
export type { RequestContext } from './logging.context';
