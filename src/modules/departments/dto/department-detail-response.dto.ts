import { ApiProperty } from '@nestjs/swagger';
import { DepartmentResponseDto } from './department-response.dto';
import { DepartmentDetail } from '../departments.service';
import { ProjectResponseDto } from '../../content/dto/project-response.dto';
import { EventResponseDto } from '../../content/dto/event-response.dto';

export class DepartmentDetailResponseDto extends DepartmentResponseDto {
  @ApiProperty({ description: 'Approved, active members of the department' })
  membersCount!: number;

  @ApiProperty({ type: [ProjectResponseDto], description: 'Up to 6 featured projects' })
  projects!: ProjectResponseDto[];

  @ApiProperty({ type: [EventResponseDto], description: 'Up to 5 latest events' })
  events!: EventResponseDto[];

  static fromDetail({
    department,
    membersCount,
    projects,
    events,
  }: DepartmentDetail): DepartmentDetailResponseDto {
    return Object.assign(new DepartmentDetailResponseDto(), DepartmentResponseDto.fromEntity(department), {
      membersCount,
      projects: projects.map((project) => ProjectResponseDto.fromEntity(project)),
      events: events.map((event) => EventResponseDto.fromEntity(event)),
    });
  }
}
