import { IsOptional, IsString, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class RejectMemberDto {
  @ApiPropertyOptional({
    example: 'Registration number does not match university records',
    description: 'Sent to the member; not stored',
  })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  reason?: string;
}
