import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Member, MemberStatus } from '../../../database/entities/member.entity';
import { pictureDeadline, pictureTimeRemaining, isPictureOverdue } from '../picture-deadline.policy';

export class MemberResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'T/DEG/2025/001' })
  regNumber!: string;

  @ApiProperty()
  email!: string;

  @ApiProperty()
  fullName!: string;

  @ApiProperty({ enum: MemberStatus })
  status!: MemberStatus;

  @ApiProperty()
  departmentId!: string;

  @ApiPropertyOptional({ nullable: true })
  departmentName!: string | null;

  @ApiPropertyOptional({ nullable: true })
  courseId!: string | null;

  @ApiPropertyOptional({ nullable: true })
  courseName!: string | null;

  @ApiProperty()
  isSystemAdmin!: boolean;

  @ApiProperty()
  registeredAt!: Date;

  @ApiPropertyOptional({ nullable: true })
  approvedAt!: Date | null;

  @ApiPropertyOptional({ nullable: true })
  pictureUrl!: string | null;

  @ApiPropertyOptional({ nullable: true })
  pictureDeadline!: Date | null;

  @ApiProperty({ description: 'Milliseconds left to upload a picture' })
  pictureTimeRemainingMs!: number;

  @ApiProperty()
  pictureOverdue!: boolean;

  static fromEntity(member: Member, now: Date = new Date()): MemberResponseDto {
    return Object.assign(new MemberResponseDto(), {
      id: member.id,
      regNumber: member.regNumber,
      email: member.email,
      fullName: member.fullName,
      status: member.status,
      departmentId: member.departmentId,
      departmentName: member.department?.name ?? null,
      courseId: member.courseId,
      courseName: member.course?.name ?? (member.courseOther || null),
      isSystemAdmin: member.isSystemAdmin,
      registeredAt: member.registeredAt,
      approvedAt: member.approvedAt,
      pictureUrl: member.pictureUrl,
      pictureDeadline: pictureDeadline(member),
      pictureTimeRemainingMs: pictureTimeRemaining(member, now),
      pictureOverdue: isPictureOverdue(member, now),
    });
  }
}
