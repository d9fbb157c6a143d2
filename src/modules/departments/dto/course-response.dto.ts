import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Course } from '../../../database/entities/course.entity';

export class CourseResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 'Bachelor of Science in Computer Science' })
  name!: string;

  @ApiPropertyOptional({ nullable: true, example: 'BSC-CS' })
  code!: string | null;

  static fromEntity(course: Course): CourseResponseDto {
    return Object.assign(new CourseResponseDto(), {
      id: course.id,
      name: course.name,
      code: course.code,
    });
  }
}
