import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, ILike, In, Repository } from 'typeorm';
import { Member, MemberStatus } from '../../../database/entities/member.entity';
import { Department } from '../../../database/entities/department.entity';

export const AUDIENCE_TARGETS = ['all_members', 'approved_members', 'pending_members'] as const;
export type AudienceTarget = (typeof AUDIENCE_TARGETS)[number];

const DEPARTMENT_PREFIX = 'department:';

function isAudienceTarget(value: string): value is AudienceTarget {
  return AUDIENCE_TARGETS.some((target) => target === value);
}

/** Escape LIKE metacharacters so a name only ever matches literally. */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * MemberAudienceService
 *
 * Turns a bulk-mail target into email addresses. A target is one of
 * all_members, approved_members, pending_members, department:<name> or a
 * comma-separated list of addresses. Inactive members are never included.
 */
@Injectable()
export class MemberAudienceService {
  constructor(
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    @InjectRepository(Department)
    private readonly departmentRepository: Repository<Department>,
  ) {}

  async resolve(target: string): Promise<string[]> {
    const selector = target.trim();
    if (!selector) {
      throw new BadRequestException('Audience target is required');
    }

    const keyword = selector.toLowerCase();
    if (isAudienceTarget(keyword)) {
      return this.emailsWhere(this.whereForTarget(keyword));
    }

    if (keyword.startsWith(DEPARTMENT_PREFIX)) {
      const name = selector.slice(DEPARTMENT_PREFIX.length).trim();
      const department = await this.findDepartment(name);
      return this.emailsWhere({ isActive: true, departmentId: department.id });
    }

    return this.resolveExplicitList(selector);
  }

  /**
   * Case-insensitive substring match on the department name.
   */
  private async findDepartment(name: string): Promise<Department> {
    if (!name) {
      throw new BadRequestException('Department name is required after "department:"');
    }
    const department = await this.departmentRepository.findOne({
      where: { name: ILike(`%${escapeLikePattern(name)}%`) },
      order: { name: 'ASC' },
    });
    if (!department) {
      throw new NotFoundException(`Department not found: ${name}`);
    }
    return department;
  }

  /**
   * Addresses belonging to a known member are kept only if that member is
   * active; addresses of non-members pass through unchanged.
   */
  private async resolveExplicitList(selector: string): Promise<string[]> {
    const addresses = selector
      .split(',')
      .map((address) => address.trim())
      .filter((address) => address.length > 0);

    if (addresses.length === 0) {
      throw new BadRequestException(`Unknown audience target: ${selector}`);
    }

    const inactive = await this.memberRepository.find({
      where: { email: In(addresses.map((a) => a.toLowerCase())), isActive: false },
      select: { id: true, email: true },
    });
    const excluded = new Set(inactive.map((member) => member.email));

    return addresses.filter((address) => !excluded.has(address.toLowerCase()));
  }

  private whereForTarget(target: AudienceTarget): FindOptionsWhere<Member> {
    switch (target) {
      case 'all_members':
        return { isActive: true };
      case 'approved_members':
        return { isActive: true, status: MemberStatus.APPROVED };
      case 'pending_members':
        return { isActive: true, status: MemberStatus.PENDING };
    }
  }

  private async emailsWhere(where: FindOptionsWhere<Member>): Promise<string[]> {
    const members = await this.memberRepository.find({
      where,
      select: { id: true, email: true },
      order: { registeredAt: 'ASC' },
    });
    return members.map((member) => member.email);
  }
}
