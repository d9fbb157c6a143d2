import { FieldError, ValidationFailedException } from '../../../common/exceptions/validation-failed.exception';

export class MemberValidationException extends ValidationFailedException {
  constructor(errors: FieldError[]) {
    super(errors, 'Registration failed');
  }
}
