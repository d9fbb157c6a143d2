import { ForbiddenException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Member, MemberStatus } from '../../../database/entities/member.entity';
import { Department } from '../../../database/entities/department.entity';
import { Actor, PermissionService, ReviewScope } from '../../../common/services/permission.service';
import { InvalidStateTransitionException } from '../exceptions/invalid-state-transition.exception';
import { MemberNotificationService } from './member-notification.service';

/**
 * ApprovalService
 *
 * Staff review of pending registrations. A member moves from pending to
 * approved or rejected exactly once.
 *
 * Checks run in a fixed order: the member exists (404), the actor may review
 * them (403), the member is still pending (409). A failed check changes nothing.
 */
@Injectable()
export class ApprovalService {
  private readonly logger = new Logger(ApprovalService.name);

  constructor(
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    @InjectRepository(Department)
    private readonly departmentRepository: Repository<Department>,
    private readonly permissionService: PermissionService,
    private readonly memberNotificationService: MemberNotificationService,
  ) {}

  async approve(memberId: string, actor: Actor): Promise<Member> {
    const member = await this.loadForReview(memberId, actor, MemberStatus.APPROVED);

    member.status = MemberStatus.APPROVED;
    member.approvedAt = new Date();
    member.rejectedAt = null;
    const saved = await this.memberRepository.save(member);

    this.logger.log(`Member ${saved.id} (${saved.regNumber}) approved by ${actor.id}`);

    const result = await this.memberNotificationService.notifyApproved(saved);
    if (!result.success) {
      this.logger.warn(`Approval email to ${saved.email} failed: ${result.error}`);
    }

    return saved;
  }

  /**
   * The reason goes into the email only; it is not stored.
   */
  async reject(memberId: string, actor: Actor, reason?: string): Promise<Member> {
    const member = await this.loadForReview(memberId, actor, MemberStatus.REJECTED);

    member.status = MemberStatus.REJECTED;
    member.rejectedAt = new Date();
    member.approvedAt = null;
    const saved = await this.memberRepository.save(member);

    this.logger.log(`Member ${saved.id} (${saved.regNumber}) rejected by ${actor.id}`);

    const result = await this.memberNotificationService.notifyRejected(saved, reason || undefined);
    if (!result.success) {
      this.logger.warn(`Rejection email to ${saved.email} failed: ${result.error}`);
    }

    return saved;
  }

  /**
   * Pending registrations the actor may review, oldest first.
   */
  async listPending(actor: Actor): Promise<Member[]> {
    const ledDepartment = actor.isSystemAdmin
      ? null
      : await this.departmentRepository.findOne({ where: { leaderId: actor.id } });

    const scope = this.permissionService.getReviewScope(actor, ledDepartment);

    if (scope === ReviewScope.ALL) {
      return this.memberRepository.find({
        where: { status: MemberStatus.PENDING },
        relations: ['department', 'course'],
        order: { registeredAt: 'ASC' },
      });
    }

    if (scope === ReviewScope.DEPARTMENT && ledDepartment) {
      return this.memberRepository.find({
        where: { status: MemberStatus.PENDING, departmentId: ledDepartment.id },
        relations: ['department', 'course'],
        order: { registeredAt: 'ASC' },
      });
    }

    throw new ForbiddenException('Only system admins and department leaders can review members');
  }

  private async loadForReview(memberId: string, actor: Actor, target: MemberStatus): Promise<Member> {
    const member = await this.memberRepository.findOne({
      where: { id: memberId },
      relations: ['department'],
    });
    if (!member) {
      throw new NotFoundException(`Member ${memberId} not found`);
    }

    const department =
      member.department ??
      (await this.departmentRepository.findOne({ where: { id: member.departmentId } }));

    if (!department || !this.permissionService.canReviewMember(actor, department)) {
      this.logger.warn(`Actor ${actor.id} denied review of member ${member.id}`);
      throw new ForbiddenException('You do not have permission to review this member');
    }

    if (member.status !== MemberStatus.PENDING) {
      throw new InvalidStateTransitionException(member.status, target);
    }

    return member;
  }
}
