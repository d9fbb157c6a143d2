import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ILike, Repository } from 'typeorm';
import { isEmail } from 'class-validator';
import * as bcrypt from 'bcrypt';
import { Member, MemberStatus } from '../../../database/entities/member.entity';
import { Department } from '../../../database/entities/department.entity';
import { passwordStrengthErrors } from '../../../common/validators/password-strength.validator';
import { BCRYPT_COST_FACTOR } from './registration.service';
import { escapeLikePattern } from './member-audience.service';

export interface CreateMemberOptions {
  email: string;
  password: string;
  regNumber: string;
  fullName: string;
  departmentName: string;
  admin?: boolean;
  leaderOf?: string;
}

export interface PromoteMemberOptions {
  admin?: boolean;
  leaderOf?: string;
}

export interface BootstrapResult {
  member: Member;
  ledDepartment: Department | null;
}

/**
 * MemberBootstrapService
 *
 * Operator-side account setup: creates approved members directly (skipping
 * the review queue) and grants system admin rights or department
 * leadership. Without it a fresh install has nobody who can review.
 */
@Injectable()
export class MemberBootstrapService {
  private readonly logger = new Logger(MemberBootstrapService.name);

  constructor(
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    @InjectRepository(Department)
    private readonly departmentRepository: Repository<Department>,
  ) {}

  async createMember(options: CreateMemberOptions): Promise<BootstrapResult> {
    const email = options.email.trim().toLowerCase();
    const regNumber = options.regNumber.trim().toUpperCase();
    const fullName = options.fullName.trim().replace(/\s+/g, ' ');

    if (!isEmail(email)) {
      throw new BadRequestException(`Invalid email address: ${options.email}`);
    }
    if (!regNumber || regNumber.length > 20) {
      throw new BadRequestException('Registration number must be 1 to 20 characters');
    }
    if (!fullName) {
      throw new BadRequestException('Full name is required');
    }
    const passwordErrors = passwordStrengthErrors(options.password);
    if (passwordErrors.length > 0) {
      throw new BadRequestException(passwordErrors.join('; '));
    }

    if (await this.memberRepository.findOne({ where: { email } })) {
      throw new ConflictException(`Member with email "${email}" already exists`);
    }
    if (await this.memberRepository.findOne({ where: { regNumber } })) {
      throw new ConflictException(`Member with registration number "${regNumber}" already exists`);
    }

    const department = await this.findDepartmentByName(options.departmentName);
    const ledDepartment = options.leaderOf ? await this.findDepartmentByName(options.leaderOf) : null;

    const now = new Date();
    const member = await this.memberRepository.save(
      this.memberRepository.create({
        email,
        regNumber,
        fullName,
        passwordHash: await bcrypt.hash(options.password, BCRYPT_COST_FACTOR),
        departmentId: department.id,
        courseId: null,
        courseOther: '',
        status: MemberStatus.APPROVED,
        isSystemAdmin: options.admin === true,
        isActive: true,
        registeredAt: now,
        approvedAt: now,
        rejectedAt: null,
      }),
    );

    this.logger.log(
      `Created member ${member.id} (${member.regNumber})${member.isSystemAdmin ? ' as system admin' : ''}`,
    );

    if (ledDepartment) {
      await this.assignLeader(member, ledDepartment);
    }

    return { member, ledDepartment };
  }

  async promoteMember(email: string, options: PromoteMemberOptions): Promise<BootstrapResult> {
    if (!options.admin && !options.leaderOf) {
      throw new BadRequestException('Nothing to change: grant admin rights or a department to lead');
    }

    const member = await this.memberRepository.findOne({
      where: { email: email.trim().toLowerCase() },
    });
    if (!member) {
      throw new NotFoundException(`Member with email "${email.trim()}" not found`);
    }

    const ledDepartment = options.leaderOf ? await this.findDepartmentByName(options.leaderOf) : null;

    if (options.admin && !member.isSystemAdmin) {
      member.isSystemAdmin = true;
      await this.memberRepository.save(member);
      this.logger.log(`Promoted ${member.email} to system admin`);
    }

    if (ledDepartment) {
      await this.assignLeader(member, ledDepartment);
    }

    return { member, ledDepartment };
  }

  /**
   * A department has one leader and a member leads at most one department,
   * so any department the member led before is released first.
   */
  private async assignLeader(member: Member, department: Department): Promise<void> {
    if (department.leaderId === member.id) {
      return;
    }

    if (department.leaderId) {
      this.logger.warn(`Replacing leader ${department.leaderId} of ${department.name}`);
    }

    await this.departmentRepository.update({ leaderId: member.id }, { leaderId: null });
    department.leaderId = member.id;
    await this.departmentRepository.save(department);

    this.logger.log(`${member.email} now leads ${department.name}`);
  }

  /**
   * Exact, case-insensitive name match.
   */
  private async findDepartmentByName(name: string): Promise<Department> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new BadRequestException('Department name is required');
    }
    const department = await this.departmentRepository.findOne({
      where: { name: ILike(escapeLikePattern(trimmed)) },
    });
    if (!department) {
      throw new NotFoundException(`Department "${trimmed}" does not exist`);
    }
    return department;
  }
}
