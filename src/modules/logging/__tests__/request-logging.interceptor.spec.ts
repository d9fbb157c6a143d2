import { RequestLoggingInterceptor } from '../interceptors/request-logging.interceptor';
import { LoggingService } from '../logging.service';
import { CallHandler, ExecutionContext, ForbiddenException } from '@nestjs/common';
import { lastValueFrom, of, throwError } from 'rxjs';
import { loggingContext } from '../logging.context';

describe('RequestLoggingInterceptor', () => {
  let interceptor: RequestLoggingInterceptor;
  let loggingService: LoggingService;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    loggingService = new LoggingService();
    jest.spyOn(loggingService.getWinstonLogger(), 'log').mockImplementation();
    jest.spyOn(Date, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1042);
    logSpy = jest.spyOn(loggingService, 'log');
    errorSpy = jest.spyOn(loggingService, 'error');
    interceptor = new RequestLoggingInterceptor(loggingService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function createMockContext(path: string, method = 'GET', user?: { id: string }): ExecutionContext {
    const request = { path, url: path, method, user };
    const response = { statusCode: 201 };
    return {
      switchToHttp: () => ({
        getRequest: () => request,
        getResponse: () => response,
      }),
    } as unknown as ExecutionContext;
  }

  function handlerReturning(value: unknown): CallHandler {
    return { handle: () => of(value) };
  }

  it('should log the incoming request', async () => {
    await lastValueFrom(
      interceptor.intercept(createMockContext('/api/members/register', 'POST'), handlerReturning({})),
    );

    expect(logSpy).toHaveBeenCalledWith(
      'Incoming request POST /api/members/register',
      'RequestLoggingInterceptor',
    );
  });

  it('should log completion with status, duration and member ID', async () => {
    await lastValueFrom(
      interceptor.intercept(
        createMockContext('/api/members/me', 'GET', { id: 'member-1' }),
        handlerReturning({}),
      ),
    );

    expect(logSpy).toHaveBeenLastCalledWith(
      {
        message: 'Request completed GET /api/members/me',
        method: 'GET',
        path: '/api/members/me',
        statusCode: 201,
        duration: 42,
        requestId: undefined,
        memberId: 'member-1',
      },
      'RequestLoggingInterceptor',
    );
  });

  it('should include the request ID from the logging context', async () => {
    await loggingContext.run({ requestId: 'req-789' }, () =>
      lastValueFrom(
        interceptor.intercept(createMockContext('/api/departments'), handlerReturning([])),
      ),
    );

    expect(logSpy).toHaveBeenLastCalledWith(
      expect.objectContaining({ requestId: 'req-789' }),
      'RequestLoggingInterceptor',
    );
  });

  it('should log failures at error level and rethrow', async () => {
    const failure = new ForbiddenException('Not allowed');
    const handler: CallHandler = { handle: () => throwError(() => failure) };

    await expect(
      lastValueFrom(interceptor.intercept(createMockContext('/api/members/m-1/approve', 'POST'), handler)),
    ).rejects.toBe(failure);

    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        message: 'Request failed POST /api/members/m-1/approve',
        statusCode: 403,
        error: 'Not allowed',
      }),
      failure.stack,
      'RequestLoggingInterceptor',
    );
  });

  it('should report 500 for non-HTTP errors', async () => {
    const handler: CallHandler = { handle: () => throwError(() => new Error('db down')) };

    await expect(
      lastValueFrom(interceptor.intercept(createMockContext('/api/courses'), handler)),
    ).rejects.toThrow('db down');

    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 500, error: 'db down' }),
      expect.any(String),
      'RequestLoggingInterceptor',
    );
  });

  it('should skip /health', async () => {
    await lastValueFrom(interceptor.intercept(createMockContext('/health'), handlerReturning({})));

    expect(logSpy).not.toHaveBeenCalled();
  });
});
