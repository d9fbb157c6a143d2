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
import { IsEnum, IsNotEmpty } from 'class-validator';
import { Department } from './department.entity';
import { Member } from './member.entity';

export enum AnnouncementType {
  GENERAL = 'general',
  DEPARTMENT = 'department',
  EVENT = 'event',
  URGENT = 'urgent',
}

@Entity('announcements')
@Index(['published', 'createdAt'])
export class Announcement {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 200 })
  @IsNotEmpty()
  title!: string;

  @Column({ type: 'text' })
  content!: string;

  @Column({ type: 'enum', enum: AnnouncementType, default: AnnouncementType.GENERAL, name: 'type' })
  @IsEnum(AnnouncementType)
  type!: AnnouncementType;

  @Column({ type: 'uuid', nullable: true, name: 'department_id' })
  departmentId!: string | null;

  @ManyToOne(() => Department, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'department_id' })
  department?: Department | null;

  @Column({ type: 'uuid', nullable: true, name: 'created_by_id' })
  createdById!: string | null;

  @ManyToOne(() => Member, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'created_by_id' })
  createdBy?: Member | null;

  /** Drafts stay off the public list. */
  @Column({ type: 'boolean', default: true })
  published!: boolean;

  @CreateDateColumn({ type: 'timestamp', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamp', name: 'updated_at' })
  updatedAt!: Date;
}
