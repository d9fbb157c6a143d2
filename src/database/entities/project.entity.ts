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
import { IsNotEmpty, IsOptional, IsUrl } from 'class-validator';
import { Department } from './department.entity';
import { Member } from './member.entity';

/** Club work showcased on the public site. */
@Entity('projects')
@Index(['featured', 'createdAt'])
export class Project {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 200 })
  @IsNotEmpty()
  title!: string;

  @Column({ type: 'varchar', length: 220, unique: true })
  @IsNotEmpty()
  slug!: string;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'varchar', length: 500, nullable: true, name: 'image_url' })
  @IsOptional()
  imageUrl!: string | null;

  @Column({ type: 'varchar', length: 500, default: '', name: 'github_url' })
  @IsOptional()
  @IsUrl()
  githubUrl!: string;

  @Column({ type: 'varchar', length: 500, default: '', name: 'live_url' })
  @IsOptional()
  @IsUrl()
  liveUrl!: string;

  @Index()
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

  @Column({ type: 'boolean', default: false })
  featured!: boolean;

  @CreateDateColumn({ type: 'timestamp', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamp', name: 'updated_at' })
  updatedAt!: Date;
}
