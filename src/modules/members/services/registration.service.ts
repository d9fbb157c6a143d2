import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import * as bcrypt from 'bcrypt';
import { Member, MemberStatus } from '../../../database/entities/member.entity';
import { Department } from '../../../database/entities/department.entity';
import { Course } from '../../../database/entities/course.entity';
import { FieldErrorBag, toFieldErrors } from '../../../common/exceptions/validation-failed.exception';
import { RegisterMemberDto } from '../dto/register-member.dto';
import { MemberValidationException } from '../exceptions/member-validation.exception';
import { MemberNotificationService } from './member-notification.service';

export const BCRYPT_COST_FACTOR = 12;

const UNIQUE_VIOLATION = '23505';

const REG_NUMBER_TAKEN = 'This registration number is already in use';
const EMAIL_TAKEN = 'This email is already registered';

/** Unique columns a concurrent registration can collide on, by DB column name. */
const UNIQUE_FIELDS = new Map<string, { field: string; message: string }>([
  ['reg_number', { field: 'regNumber', message: REG_NUMBER_TAKEN }],
  ['email', { field: 'email', message: EMAIL_TAKEN }],
]);

/**
 * Column named in a Postgres unique violation ("Key (email)=(...) already
 * exists."), or null for any other error.
 */
export function uniqueViolationColumn(error: unknown): string | null {
  if (!(error instanceof QueryFailedError)) {
    return null;
  }
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return null;
  }
  if (!('code' in driverError) || driverError.code !== UNIQUE_VIOLATION) {
    return null;
  }
  const detail = 'detail' in driverError && typeof driverError.detail === 'string' ? driverError.detail : '';
  const match = /^Key \(([^)]+)\)=/.exec(detail);
  return match ? match[1] : null;
}

/**
 * RegistrationService
 *
 * Validates a candidate, stores a pending member and notifies the member and
 * the staff. Every field problem is collected before failing, so the caller
 * gets one itemized error instead of the first problem only.
 */
@Injectable()
export class RegistrationService {
  private readonly logger = new Logger(RegistrationService.name);

  constructor(
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    @InjectRepository(Department)
    private readonly departmentRepository: Repository<Department>,
    @InjectRepository(Course)
    private readonly courseRepository: Repository<Course>,
    private readonly memberNotificationService: MemberNotificationService,
  ) {}

  async register(candidate: RegisterMemberDto): Promise<Member> {
    // Normalizes again when called outside the HTTP pipe (commands, tests)
    const dto = plainToInstance(RegisterMemberDto, { ...candidate });

    const errors = new FieldErrorBag();
    errors.addAll(toFieldErrors(await validate(dto)));

    // 1. Uniqueness, only for values that are well-formed
    if (!errors.has('regNumber')) {
      const existing = await this.memberRepository.findOne({ where: { regNumber: dto.regNumber } });
      if (existing) {
        errors.add('regNumber', REG_NUMBER_TAKEN);
      }
    }

    if (!errors.has('email')) {
      const existing = await this.memberRepository.findOne({ where: { email: dto.email } });
      if (existing) {
        errors.add('email', EMAIL_TAKEN);
      }
    }

    // 2. Reference data
    let department: Department | null = null;
    if (!errors.has('departmentId')) {
      department = await this.departmentRepository.findOne({ where: { id: dto.departmentId } });
      if (!department) {
        errors.add('departmentId', 'Selected department does not exist');
      }
    }

    if (dto.courseId && !errors.has('courseId')) {
      const course = await this.courseRepository.findOne({ where: { id: dto.courseId } });
      if (!course) {
        errors.add('courseId', 'Selected course does not exist');
      }
    }

    if (!dto.courseId && !dto.courseOther) {
      errors.add('courseId', "Please select a course or specify your course in the 'Other' field");
    }

    if (!department || !errors.isEmpty()) {
      this.logger.warn(
        `Registration rejected for ${dto.regNumber || '<no reg number>'}: ${errors
          .toList()
          .map((e) => e.field)
          .join(', ')}`,
      );
      throw new MemberValidationException(errors.toList());
    }

    // 3. Persist the pending member
    const passwordHash = await bcrypt.hash(dto.password, BCRYPT_COST_FACTOR);

    const member = await this.saveMember(
      this.memberRepository.create({
        regNumber: dto.regNumber,
        email: dto.email,
        fullName: dto.fullName,
        passwordHash,
        departmentId: department.id,
        courseId: dto.courseId ?? null,
        courseOther: dto.courseOther ?? '',
        status: MemberStatus.PENDING,
        isSystemAdmin: false,
        isActive: true,
        registeredAt: new Date(),
        approvedAt: null,
      }),
    );

    this.logger.log(`Member registered: ${member.id} (${member.regNumber}) in ${department.name}`);

    // 4. Notifications never fail the registration
    try {
      const { confirmation, staffAlert } = await this.memberNotificationService.notifyRegistered(
        member,
        department,
      );
      if (!confirmation.success) {
        this.logger.warn(`Confirmation email to ${member.email} failed: ${confirmation.error}`);
      }
      if (staffAlert.failed > 0) {
        this.logger.warn(
          `Staff alert for ${member.regNumber} failed for ${staffAlert.failed} of ${staffAlert.total} recipients`,
        );
      }
    } catch (error) {
      this.logger.error(
        `Registration notifications for ${member.id} failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    }

    return member;
  }

  /**
   * A registration racing this one can pass the uniqueness lookups too; the
   * unique index then decides, and the loser gets the same field error.
   */
  private async saveMember(member: Member): Promise<Member> {
    try {
      return await this.memberRepository.save(member);
    } catch (error) {
      const column = uniqueViolationColumn(error);
      const unique = column ? UNIQUE_FIELDS.get(column) : undefined;
      if (!unique) {
        throw error;
      }
      this.logger.warn(`Registration for ${member.regNumber} lost a race on ${column}`);
      throw new MemberValidationException([{ field: unique.field, messages: [unique.message] }]);
    }
  }
}
