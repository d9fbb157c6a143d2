import { Controller, Get, Param } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { DepartmentsService } from './departments.service';
import { DepartmentResponseDto } from './dto/department-response.dto';
import { DepartmentDetailResponseDto } from './dto/department-detail-response.dto';
import { CourseResponseDto } from './dto/course-response.dto';
import { Public } from '../auth/decorators/public.decorator';
import { SkipPictureCheck } from '../../common/decorators/skip-picture-check.decorator';

@ApiTags('Reference Data')
@Controller('api')
@Public()
@SkipPictureCheck()
export class DepartmentsController {
  constructor(private readonly departmentsService: DepartmentsService) {}

  @Get('departments')
  @ApiOperation({ summary: 'List club departments' })
  @ApiResponse({ status: 200, type: [DepartmentResponseDto] })
  async listDepartments(): Promise<DepartmentResponseDto[]> {
    const departments = await this.departmentsService.listDepartments();
    return departments.map((department) => DepartmentResponseDto.fromEntity(department));
  }

  @Get('departments/:slug')
  @ApiOperation({ summary: 'Department page with featured projects and recent events' })
  @ApiResponse({ status: 200, type: DepartmentDetailResponseDto })
  @ApiResponse({ status: 404, description: 'Department not found' })
  async getDepartment(@Param('slug') slug: string): Promise<DepartmentDetailResponseDto> {
    return DepartmentDetailResponseDto.fromDetail(
      await this.departmentsService.getDepartmentDetail(slug),
    );
  }

  @Get('courses')
  @ApiOperation({ summary: 'List courses offered at registration' })
  @ApiResponse({ status: 200, type: [CourseResponseDto] })
  async listCourses(): Promise<CourseResponseDto[]> {
    const courses = await this.departmentsService.listCourses();
    return courses.map((course) => CourseResponseDto.fromEntity(course));
  }
}
