import { ExecutionContext, ForbiddenException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { PictureDeadlineGuard, PICTURE_UPLOAD_REQUIRED } from '../picture-deadline.guard';
import { SkipPictureCheck } from '../../decorators/skip-picture-check.decorator';
import { Member, MemberStatus } from '../../../database/entities/member.entity';
import { buildAdmin, buildMember } from '../../../modules/members/__tests__/member.fixtures';

class SampleController {
  @SkipPictureCheck()
  uploadPicture(): void {}

  profile(): void {}
}

@SkipPictureCheck()
class ExemptController {
  anything(): void {}
}

describe('PictureDeadlineGuard', () => {
  const guard = new PictureDeadlineGuard(new Reflector());
  const now = new Date('2025-03-10T12:00:00Z');

  function createMockContext(
    user: Member | undefined,
    handler: () => void = SampleController.prototype.profile,
    controller: object = SampleController,
  ): ExecutionContext {
    const request = { user, method: 'GET', url: '/api/members/me' };
    return {
      getHandler: () => handler,
      getClass: () => controller,
      switchToHttp: () => ({ getRequest: () => request }),
    } as unknown as ExecutionContext;
  }

  const overdueMember = buildMember({
    status: MemberStatus.APPROVED,
    approvedAt: new Date('2025-03-07T11:00:00Z'), // 73 hours before now
  });

  beforeEach(() => {
    jest.useFakeTimers().setSystemTime(now);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should allow requests without an authenticated member', () => {
    expect(guard.canActivate(createMockContext(undefined))).toBe(true);
  });

  it('should allow a pending member', () => {
    expect(guard.canActivate(createMockContext(buildMember()))).toBe(true);
  });

  it('should allow an approved member inside the deadline', () => {
    const member = buildMember({
      status: MemberStatus.APPROVED,
      approvedAt: new Date('2025-03-08T12:00:00Z'),
    });
    expect(guard.canActivate(createMockContext(member))).toBe(true);
  });

  it('should block an overdue member with the upload code', () => {
    let thrown: unknown;
    try {
      guard.canActivate(createMockContext(overdueMember));
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ForbiddenException);
    expect(thrown instanceof ForbiddenException && thrown.getResponse()).toEqual({
      message: 'Upload your profile picture to continue using the club site',
      code: PICTURE_UPLOAD_REQUIRED,
      uploadPath: '/api/members/me/picture',
      deadline: '2025-03-10T11:00:00.000Z',
    });
  });

  it('should allow an overdue member once a picture is uploaded', () => {
    const member = buildMember({
      ...overdueMember,
      pictureUploadedAt: new Date('2025-03-10T11:30:00Z'),
    });
    expect(guard.canActivate(createMockContext(member))).toBe(true);
  });

  it('should never restrict a system admin', () => {
    const admin = buildAdmin({ approvedAt: overdueMember.approvedAt, pictureUploadedAt: null });
    expect(guard.canActivate(createMockContext(admin))).toBe(true);
  });

  it('should skip handlers marked with @SkipPictureCheck', () => {
    expect(
      guard.canActivate(createMockContext(overdueMember, SampleController.prototype.uploadPicture)),
    ).toBe(true);
  });

  it('should skip controllers marked with @SkipPictureCheck', () => {
    expect(
      guard.canActivate(
        createMockContext(overdueMember, ExemptController.prototype.anything, ExemptController),
      ),
    ).toBe(true);
  });
});
