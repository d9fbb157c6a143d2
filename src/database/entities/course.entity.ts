import { Entity, Column, PrimaryGeneratedColumn } from 'typeorm';
import { IsNotEmpty, IsOptional } from 'class-validator';

@Entity('courses')
export class Course {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 150, unique: true })
  @IsNotEmpty()
  name!: string;

  @Column({ type: 'varchar', length: 20, unique: true, nullable: true })
  @IsOptional()
  code!: string | null;
}
