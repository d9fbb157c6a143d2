import { BadRequestException } from '@nestjs/common';
import { ValidationError } from 'class-validator';

export interface FieldError {
  field: string;
  messages: string[];
}

/**
 * Flatten class-validator errors into one entry per field, nested
 * properties joined with dots.
 */
export function toFieldErrors(errors: ValidationError[], parentPath = ''): FieldError[] {
  const result: FieldError[] = [];
  for (const error of errors) {
    const field = parentPath ? `${parentPath}.${error.property}` : error.property;
    const messages = Object.values(error.constraints ?? {});
    if (messages.length > 0) {
      result.push({ field, messages });
    }
    if (error.children && error.children.length > 0) {
      result.push(...toFieldErrors(error.children, field));
    }
  }
  return result;
}

/**
 * Accumulates messages per field, keeping fields in first-seen order.
 */
export class FieldErrorBag {
  private readonly entries = new Map<string, string[]>();

  add(field: string, message: string): void {
    const messages = this.entries.get(field);
    if (messages) {
      messages.push(message);
    } else {
      this.entries.set(field, [message]);
    }
  }

  addAll(errors: FieldError[]): void {
    for (const error of errors) {
      for (const message of error.messages) {
        this.add(error.field, message);
      }
    }
  }

  has(field: string): boolean {
    return this.entries.has(field);
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  toList(): FieldError[] {
    return [...this.entries].map(([field, messages]) => ({ field, messages }));
  }
}

export class ValidationFailedException extends BadRequestException {
  constructor(
    readonly errors: FieldError[],
    message = 'Validation failed',
  ) {
    super({ message, errors });
  }
}

/**
 * exceptionFactory for the global ValidationPipe, so DTO errors share the
 * itemized shape of workflow validation errors.
 */
export function validationExceptionFactory(errors: ValidationError[]): ValidationFailedException {
  return new ValidationFailedException(toFieldErrors(errors));
}
