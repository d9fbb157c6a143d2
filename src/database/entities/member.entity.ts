import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { IsEmail, IsNotEmpty, IsBoolean, IsOptional, IsEnum } from 'class-validator';
import { Department } from './department.entity';
import { Course } from './course.entity';

export enum MemberStatus {
  PENDING = 'pending',
  APPROVED = 'approved',
  REJECTED = 'rejected',
}

@Entity('members')
@Index(['status', 'registeredAt'])
export class Member {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20, unique: true, name: 'reg_number' })
  @IsNotEmpty()
  regNumber!: string;

  @Column({ type: 'varchar', length: 255, unique: true })
  @IsEmail()
  @IsNotEmpty()
  email!: string;

  @Column({ type: 'varchar', length: 200, name: 'full_name' })
  @IsNotEmpty()
  fullName!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  @IsNotEmpty()
  passwordHash!: string;

  @Column({ type: 'uuid', name: 'department_id' })
  departmentId!: string;

  @ManyToOne(() => Department, (department) => department.members)
  @JoinColumn({ name: 'department_id' })
  department?: Department;

  @Column({ type: 'uuid', nullable: true, name: 'course_id' })
  @IsOptional()
  courseId!: string | null;

  @ManyToOne(() => Course, { nullable: true })
  @JoinColumn({ name: 'course_id' })
  course?: Course | null;

  @Column({ type: 'varchar', length: 150, default: '', name: 'course_other' })
  courseOther!: string;

  @Column({
    type: 'enum',
    enum: MemberStatus,
    default: MemberStatus.PENDING,
  })
  @IsEnum(MemberStatus)
  status!: MemberStatus;

  @Column({ type: 'boolean', default: false, name: 'is_system_admin' })
  @IsBoolean()
  isSystemAdmin!: boolean;

  @Column({ type: 'boolean', default: true, name: 'is_active' })
  @IsBoolean()
  isActive!: boolean;

  @CreateDateColumn({ type: 'timestamp', name: 'registered_at' })
  registeredAt!: Date;

  @Column({ type: 'timestamp', nullable: true, name: 'approved_at' })
  @IsOptional()
  approvedAt!: Date | null;

  @Column({ type: 'timestamp', nullable: true, name: 'rejected_at' })
  @IsOptional()
  rejectedAt!: Date | null;

  @Column({ type: 'varchar', length: 500, nullable: true, name: 'picture_url' })
  @IsOptional()
  pictureUrl!: string | null;

  @Column({ type: 'timestamp', nullable: true, name: 'picture_uploaded_at' })
  @IsOptional()
  pictureUploadedAt!: Date | null;

  @Column({ type: 'timestamp', nullable: true, name: 'picture_reminder_sent_at' })
  @IsOptional()
  pictureReminderSentAt!: Date | null;

  @UpdateDateColumn({ type: 'timestamp', name: 'updated_at' })
  updatedAt!: Date;
}
