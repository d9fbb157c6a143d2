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
import { IsNotEmpty, IsOptional } from 'class-validator';
import { Department } from './department.entity';

@Entity('events')
export class ClubEvent {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 200 })
  @IsNotEmpty()
  title!: string;

  @Column({ type: 'text' })
  description!: string;

  @Index()
  @Column({ type: 'timestamp', name: 'event_date' })
  eventDate!: Date;

  @Column({ type: 'varchar', length: 200 })
  @IsNotEmpty()
  location!: string;

  @Index()
  @Column({ type: 'uuid', nullable: true, name: 'department_id' })
  departmentId!: string | null;

  @ManyToOne(() => Department, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'department_id' })
  department?: Department | null;

  @Column({ type: 'varchar', length: 500, nullable: true, name: 'image_url' })
  @IsOptional()
  imageUrl!: string | null;

  @CreateDateColumn({ type: 'timestamp', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamp', name: 'updated_at' })
  updatedAt!: Date;
}
