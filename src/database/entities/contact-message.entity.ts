import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index } from 'typeorm';
import { IsEmail, IsNotEmpty } from 'class-validator';

/** A visitor's message from the public contact form. */
@Entity('contact_messages')
@Index(['responded', 'createdAt'])
export class ContactMessage {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 150 })
  @IsNotEmpty()
  name!: string;

  @Column({ type: 'varchar', length: 254 })
  @IsEmail()
  email!: string;

  @Column({ type: 'varchar', length: 20, default: '' })
  phone!: string;

  @Column({ type: 'varchar', length: 200 })
  @IsNotEmpty()
  subject!: string;

  @Column({ type: 'text' })
  message!: string;

  @Column({ type: 'boolean', default: false })
  responded!: boolean;

  @CreateDateColumn({ type: 'timestamp', name: 'created_at' })
  createdAt!: Date;
}
