import { registerDecorator, ValidationArguments, ValidationOptions } from 'class-validator';

/**
 * Property must equal another property of the same object
 * (password confirmation).
 */
export function Match(property: string, validationOptions?: ValidationOptions) {
  return (object: object, propertyName: string) => {
    registerDecorator({
      name: 'match',
      target: object.constructor,
      propertyName,
      constraints: [property],
      options: validationOptions,
      validator: {
        validate(value: unknown, args: ValidationArguments): boolean {
          const [relatedPropertyName] = args.constraints;
          const relatedValue: unknown = Reflect.get(args.object, relatedPropertyName);
          return value === relatedValue;
        },
        defaultMessage(args: ValidationArguments): string {
          return `${args.property} must match ${String(args.constraints[0])}`;
        },
      },
    });
  };
}
