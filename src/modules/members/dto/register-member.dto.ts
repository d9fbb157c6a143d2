import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  Matches,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Match } from '../../../common/validators/match.validator';
import { IsStrongClubPassword } from '../../../common/validators/password-strength.validator';

/** T/<LEVEL>/<YEAR>/<SEQUENCE>, e.g. T/DEG/2025/001 */
export const REG_NUMBER_PATTERN = /^T\/[A-Z]{2,5}\/\d{4}\/\d{1,5}$/;

const FULL_NAME_PATTERN = /^\S+(\s+\S+)+$/;

export class RegisterMemberDto {
  @ApiProperty({
    example: 'T/DEG/2025/001',
    description: 'Registration number, stored upper-case',
  })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toUpperCase() : value))
  @IsString()
  @IsNotEmpty({ message: 'Registration number is required' })
  @Matches(REG_NUMBER_PATTERN, {
    message: 'Registration number must follow the format T/LEVEL/YEAR/NUMBER (e.g. T/DEG/2025/001)',
  })
  regNumber!: string;

  @ApiProperty({ example: 'john.doe@example.com', description: 'Email address, stored lower-case' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsEmail({}, { message: 'Enter a valid email address' })
  email!: string;

  @ApiProperty({ example: 'John Doe Smith', description: 'First and last name at minimum' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().replace(/\s+/g, ' ') : value))
  @IsString()
  @MaxLength(200)
  @Matches(FULL_NAME_PATTERN, { message: 'Please enter your full name (first and last name)' })
  fullName!: string;

  @ApiProperty({
    example: 'StrongPass123!',
    description: 'Min 8 chars with upper-case, lower-case, digit and special character',
    minLength: 8,
  })
  @IsStrongClubPassword()
  password!: string;

  @ApiProperty({ example: 'StrongPass123!', description: 'Must match password' })
  @Match('password', { message: 'Passwords do not match' })
  confirmPassword!: string;

  @ApiProperty({ description: 'Department ID' })
  @IsUUID('all', { message: 'Select a valid department' })
  departmentId!: string;

  @ApiPropertyOptional({ description: 'Course ID; leave empty and fill courseOther when not listed' })
  @Transform(({ value }) => (value === '' ? undefined : value))
  @IsOptional()
  @IsUUID('all', { message: 'Select a valid course' })
  courseId?: string;

  @ApiPropertyOptional({ example: 'Data Science', description: 'Course name when not in the list' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsOptional()
  @IsString()
  @MaxLength(150)
  courseOther?: string;
}
