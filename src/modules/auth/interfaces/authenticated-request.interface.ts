import { Request } from 'express';
import { Member } from '../../../database/entities/member.entity';

/**
 * Request after JwtAuthGuard has run: JwtStrategy.validate() puts the
 * member loaded from the token subject on request.user.
 */
export interface AuthenticatedRequest extends Request {
  user: Member;
}
