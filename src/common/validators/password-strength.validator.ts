import { registerDecorator, ValidationOptions } from 'class-validator';

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_SPECIAL_CHARACTERS = '!@#$%^&*(),.?":{}|<>';

interface PasswordRule {
  name: string;
  test: (password: string) => boolean;
  message: string;
}

const PASSWORD_RULES: PasswordRule[] = [
  {
    name: 'passwordMinLength',
    test: (password) => password.length >= PASSWORD_MIN_LENGTH,
    message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters long`,
  },
  {
    name: 'passwordLowercase',
    test: (password) => /[a-z]/.test(password),
    message: 'Password must contain at least one lowercase letter',
  },
  {
    name: 'passwordUppercase',
    test: (password) => /[A-Z]/.test(password),
    message: 'Password must contain at least one uppercase letter',
  },
  {
    name: 'passwordDigit',
    test: (password) => /\d/.test(password),
    message: 'Password must contain at least one digit',
  },
  {
    name: 'passwordSpecialCharacter',
    test: (password) => /[!@#$%^&*(),.?":{}|<>]/.test(password),
    message: 'Password must contain at least one special character',
  },
];

/**
 * Every rule the password breaks, in a fixed order.
 */
export function passwordStrengthErrors(password: string): string[] {
  return PASSWORD_RULES.filter((rule) => !rule.test(password)).map((rule) => rule.message);
}

/**
 * One constraint per rule, so a weak password reports each missing
 * requirement separately instead of the last message winning.
 */
export function IsStrongClubPassword(validationOptions?: ValidationOptions) {
  return (object: object, propertyName: string) => {
    for (const rule of PASSWORD_RULES) {
      registerDecorator({
        name: rule.name,
        target: object.constructor,
        propertyName,
        options: { message: rule.message, ...validationOptions },
        validator: {
          validate(value: unknown): boolean {
            return typeof value === 'string' && rule.test(value);
          },
        },
      });
    }
  };
}
