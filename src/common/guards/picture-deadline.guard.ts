import { Injectable, CanActivate, ExecutionContext, ForbiddenException, Logger } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { Member } from '../../database/entities/member.entity';
import { isPictureOverdue, pictureDeadline } from '../../modules/members/picture-deadline.policy';

export const SKIP_PICTURE_CHECK_KEY = 'skip_picture_check';
export const PICTURE_UPLOAD_REQUIRED = 'PICTURE_UPLOAD_REQUIRED';
export const PICTURE_UPLOAD_PATH = '/api/members/me/picture';

/**
 * Guard that blocks members who missed the profile-picture deadline.
 *
 * Execution order in guard chain:
 *   JwtAuthGuard -> PictureDeadlineGuard -> Handler
 *
 * Behavior:
 * 1. If @SkipPictureCheck decorator is present, pass through
 * 2. No authenticated member (public routes), pass through
 * 3. System admins are never restricted
 * 4. Overdue members get 403 with code PICTURE_UPLOAD_REQUIRED and the upload path
 */
@Injectable()
export class PictureDeadlineGuard implements CanActivate {
  private readonly logger = new Logger(PictureDeadlineGuard.name);

  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const skipPictureCheck = this.reflector.getAllAndOverride<boolean>(SKIP_PICTURE_CHECK_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (skipPictureCheck) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request & { user?: Member }>();
    const member = request.user;

    if (!member || member.isSystemAdmin) {
      return true;
    }

    if (!isPictureOverdue(member, new Date())) {
      return true;
    }

    const deadline = pictureDeadline(member);
    this.logger.warn(
      `Blocked ${request.method} ${request.url} for member ${member.id}: picture overdue since ${deadline?.toISOString()}`,
    );

    throw new ForbiddenException({
      message: 'Upload your profile picture to continue using the club site',
      code: PICTURE_UPLOAD_REQUIRED,
      uploadPath: PICTURE_UPLOAD_PATH,
      deadline: deadline?.toISOString(),
    });
  }
}
