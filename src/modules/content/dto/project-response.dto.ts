import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Project } from '../../../database/entities/project.entity';

export class ProjectResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  title!: string;

  @ApiProperty({ example: 'attendance-tracker' })
  slug!: string;

  @ApiProperty()
  description!: string;

  @ApiPropertyOptional({ nullable: true })
  imageUrl!: string | null;

  @ApiProperty({ description: 'Empty when the project has no public repository' })
  githubUrl!: string;

  @ApiProperty({ description: 'Empty when the project has no live deployment' })
  liveUrl!: string;

  @ApiProperty()
  featured!: boolean;

  @ApiPropertyOptional({ nullable: true })
  departmentName!: string | null;

  @ApiPropertyOptional({ nullable: true })
  departmentSlug!: string | null;

  @ApiPropertyOptional({ nullable: true, description: 'Full name of the member who added it' })
  createdByName!: string | null;

  @ApiProperty()
  createdAt!: Date;

  static fromEntity(project: Project): ProjectResponseDto {
    return Object.assign(new ProjectResponseDto(), {
      id: project.id,
      title: project.title,
      slug: project.slug,
      description: project.description,
      imageUrl: project.imageUrl,
      githubUrl: project.githubUrl,
      liveUrl: project.liveUrl,
      featured: project.featured,
      departmentName: project.department?.name ?? null,
      departmentSlug: project.department?.slug ?? null,
      createdByName: project.createdBy?.fullName ?? null,
      createdAt: project.createdAt,
    });
  }
}
