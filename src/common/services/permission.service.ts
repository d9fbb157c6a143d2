import { Injectable } from '@nestjs/common';
import { Member } from '../../database/entities/member.entity';
import { Department } from '../../database/entities/department.entity';

/**
 * The part of a member that review permissions depend on.
 */
export type Actor = Pick<Member, 'id' | 'isSystemAdmin'>;

export type ReviewedDepartment = Pick<Department, 'id' | 'leaderId'>;

export enum ReviewScope {
  /** Every department */
  ALL = 'all',
  /** Only the department the actor leads */
  DEPARTMENT = 'department',
  NONE = 'none',
}

@Injectable()
export class PermissionService {
  /**
   * System admins review every registration; a department leader reviews
   * only their own department's.
   */
  canReviewMember(actor: Actor, department: ReviewedDepartment): boolean {
    if (actor.isSystemAdmin) {
      return true;
    }
    return department.leaderId !== null && department.leaderId === actor.id;
  }

  /**
   * @param ledDepartment - the department the actor leads, if any
   */
  getReviewScope(actor: Actor, ledDepartment: ReviewedDepartment | null): ReviewScope {
    if (actor.isSystemAdmin) {
      return ReviewScope.ALL;
    }
    if (ledDepartment && this.canReviewMember(actor, ledDepartment)) {
      return ReviewScope.DEPARTMENT;
    }
    return ReviewScope.NONE;
  }
}
