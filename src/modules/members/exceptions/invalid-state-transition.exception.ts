import { ConflictException } from '@nestjs/common';
import { MemberStatus } from '../../../database/entities/member.entity';

export class InvalidStateTransitionException extends ConflictException {
  constructor(
    readonly from: MemberStatus,
    readonly to: MemberStatus,
  ) {
    super(`Cannot change member status from ${from} to ${to}: only pending members can be reviewed`);
  }
}
