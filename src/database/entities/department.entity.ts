import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  OneToOne,
  JoinColumn,
} from 'typeorm';
import { IsNotEmpty, IsOptional } from 'class-validator';
import { Member } from './member.entity';

@Entity('departments')
export class Department {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 100, unique: true })
  @IsNotEmpty()
  name!: string;

  @Column({ type: 'varchar', length: 100, unique: true })
  @IsNotEmpty()
  slug!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  /** Leader has review rights over this department's registrations. */
  @Column({ type: 'uuid', nullable: true, unique: true, name: 'leader_id' })
  @IsOptional()
  leaderId!: string | null;

  @OneToOne(() => Member, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'leader_id' })
  leader?: Member | null;

  @OneToMany(() => Member, (member) => member.department)
  members?: Member[];

  @CreateDateColumn({ type: 'timestamp', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamp', name: 'updated_at' })
  updatedAt!: Date;
}
