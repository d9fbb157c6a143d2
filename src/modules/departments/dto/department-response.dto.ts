import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Department } from '../../../database/entities/department.entity';

export class DepartmentResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'Programming' })
  name!: string;

  @ApiProperty({ example: 'programming' })
  slug!: string;

  @ApiProperty()
  description!: string;

  @ApiPropertyOptional({ nullable: true, description: 'Full name of the department leader' })
  leaderName!: string | null;

  static fromEntity(department: Department): DepartmentResponseDto {
    return Object.assign(new DepartmentResponseDto(), {
      id: department.id,
      name: department.name,
      slug: department.slug,
      description: department.description,
      leaderName: department.leader?.fullName ?? null,
    });
  }
}
