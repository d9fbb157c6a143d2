import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { FieldError } from '../exceptions/validation-failed.exception';

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  statusCode: number;
  message: string;
  error: string;
  timestamp: string;
  path: string;
  code?: string;
  errors?: FieldError[];
}

function isFieldErrorList(value: unknown): value is FieldError[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) =>
        typeof item === 'object' &&
        item !== null &&
        'field' in item &&
        typeof item.field === 'string' &&
        'messages' in item &&
        Array.isArray(item.messages),
    )
  );
}

/**
 * Global HTTP exception filter to standardize error responses.
 * Itemized field errors and a machine-readable code are passed through
 * when the exception carries them.
 */
@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: HttpException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const status = exception.getStatus();
    const exceptionResponse = exception.getResponse();

    let message = 'An error occurred';
    let errors: FieldError[] | undefined;
    let code: string | undefined;

    if (typeof exceptionResponse === 'string') {
      message = exceptionResponse;
    } else if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
      if ('message' in exceptionResponse) {
        const msg = exceptionResponse.message;
        if (Array.isArray(msg)) {
          message = msg.join(', ');
        } else if (typeof msg === 'string') {
          message = msg;
        }
      }
      if ('errors' in exceptionResponse && isFieldErrorList(exceptionResponse.errors)) {
        errors = exceptionResponse.errors;
      }
      if ('code' in exceptionResponse && typeof exceptionResponse.code === 'string') {
        code = exceptionResponse.code;
      }
    }

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error: HttpStatus[status] || 'Error',
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    if (code) {
      errorResponse.code = code;
    }
    if (errors) {
      errorResponse.errors = errors;
    }

    // Log server errors and auth failures; other 4xx are the client's problem
    if (status >= 500 || status === 401 || status === 403) {
      this.logger.error(
        `HTTP ${status} Error: ${message} | Path: ${request.url} | IP: ${request.ip}`,
        exception.stack,
      );
    }

    response.status(status).json(errorResponse);
  }
}
