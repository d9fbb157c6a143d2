import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { ContentService } from './content.service';
import { ContentQueryDto, PageQueryDto } from './dto/content-query.dto';
import { PaginatedResponseDto } from './dto/paginated-response.dto';
import { ProjectResponseDto } from './dto/project-response.dto';
import { EventResponseDto } from './dto/event-response.dto';
import { AnnouncementResponseDto } from './dto/announcement-response.dto';
import { Public } from '../auth/decorators/public.decorator';
import { SkipPictureCheck } from '../../common/decorators/skip-picture-check.decorator';

@ApiTags('Content')
@Controller('api')
@Public()
@SkipPictureCheck()
export class ContentController {
  constructor(private readonly contentService: ContentService) {}

  @Get('projects')
  @ApiOperation({ summary: 'List club projects, featured first' })
  @ApiResponse({ status: 200, description: 'One page of projects' })
  async listProjects(
    @Query() query: ContentQueryDto,
  ): Promise<PaginatedResponseDto<ProjectResponseDto>> {
    const { items, pagination } = await this.contentService.listProjects(query);
    return { items: items.map((project) => ProjectResponseDto.fromEntity(project)), pagination };
  }

  @Get('projects/:slug')
  @ApiOperation({ summary: 'Project details' })
  @ApiResponse({ status: 200, type: ProjectResponseDto })
  @ApiResponse({ status: 404, description: 'Project not found' })
  async getProject(@Param('slug') slug: string): Promise<ProjectResponseDto> {
    return ProjectResponseDto.fromEntity(await this.contentService.getProject(slug));
  }

  @Get('events')
  @ApiOperation({ summary: 'List club events, latest first' })
  @ApiResponse({ status: 200, description: 'One page of events' })
  async listEvents(@Query() query: ContentQueryDto): Promise<PaginatedResponseDto<EventResponseDto>> {
    const { items, pagination } = await this.contentService.listEvents(query);
    return { items: items.map((event) => EventResponseDto.fromEntity(event)), pagination };
  }

  @Get('announcements')
  @ApiOperation({ summary: 'List published announcements, newest first' })
  @ApiResponse({ status: 200, description: 'One page of announcements' })
  async listAnnouncements(
    @Query() query: PageQueryDto,
  ): Promise<PaginatedResponseDto<AnnouncementResponseDto>> {
    const { items, pagination } = await this.contentService.listAnnouncements(query);
    return {
      items: items.map((announcement) => AnnouncementResponseDto.fromEntity(announcement)),
      pagination,
    };
  }
}
