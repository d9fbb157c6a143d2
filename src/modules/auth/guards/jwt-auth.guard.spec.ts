import { ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { JwtAuthGuard } from './jwt-auth.guard';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';

describe('JwtAuthGuard', () => {
  const reflector = new Reflector();
  const guard = new JwtAuthGuard(reflector);

  const context = {
    getHandler: () => function handler() {},
    getClass: () => class Controller {},
  } as unknown as ExecutionContext;

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should allow public routes without a token', () => {
    const spy = jest.spyOn(reflector, 'getAllAndOverride').mockReturnValue(true);

    expect(guard.canActivate(context)).toBe(true);
    expect(spy).toHaveBeenCalledWith(IS_PUBLIC_KEY, [expect.any(Function), expect.any(Function)]);
  });
});
