import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { Project } from '../../database/entities/project.entity';
import { ClubEvent } from '../../database/entities/club-event.entity';
import { Announcement } from '../../database/entities/announcement.entity';
import { ContentQueryDto, PageQueryDto } from './dto/content-query.dto';
import { PaginatedResponseDto, paginate } from './dto/paginated-response.dto';

export const PROJECTS_PAGE_SIZE = 12;
export const EVENTS_PAGE_SIZE = 12;
export const ANNOUNCEMENTS_PAGE_SIZE = 10;

/**
 * ContentService
 *
 * Read-only listings behind the public site: projects (featured first),
 * events (latest date first) and published announcements (newest first).
 * Projects and events can be narrowed to one department by slug.
 */
@Injectable()
export class ContentService {
  constructor(
    @InjectRepository(Project)
    private readonly projectRepository: Repository<Project>,
    @InjectRepository(ClubEvent)
    private readonly eventRepository: Repository<ClubEvent>,
    @InjectRepository(Announcement)
    private readonly announcementRepository: Repository<Announcement>,
  ) {}

  async listProjects(query: ContentQueryDto): Promise<PaginatedResponseDto<Project>> {
    const page = query.page || 1;
    const where: FindOptionsWhere<Project> = query.department
      ? { department: { slug: query.department } }
      : {};

    const [items, total] = await this.projectRepository.findAndCount({
      where,
      relations: ['department'],
      order: { featured: 'DESC', createdAt: 'DESC' },
      skip: (page - 1) * PROJECTS_PAGE_SIZE,
      take: PROJECTS_PAGE_SIZE,
    });

    return paginate(items, total, page, PROJECTS_PAGE_SIZE);
  }

  async getProject(slug: string): Promise<Project> {
    const project = await this.projectRepository.findOne({
      where: { slug },
      relations: ['department', 'createdBy'],
    });
    if (!project) {
      throw new NotFoundException(`Project ${slug} not found`);
    }
    return project;
  }

  async listEvents(query: ContentQueryDto): Promise<PaginatedResponseDto<ClubEvent>> {
    const page = query.page || 1;
    const where: FindOptionsWhere<ClubEvent> = query.department
      ? { department: { slug: query.department } }
      : {};

    const [items, total] = await this.eventRepository.findAndCount({
      where,
      relations: ['department'],
      order: { eventDate: 'DESC' },
      skip: (page - 1) * EVENTS_PAGE_SIZE,
      take: EVENTS_PAGE_SIZE,
    });

    return paginate(items, total, page, EVENTS_PAGE_SIZE);
  }

  async listAnnouncements(query: PageQueryDto): Promise<PaginatedResponseDto<Announcement>> {
    const page = query.page || 1;

    const [items, total] = await this.announcementRepository.findAndCount({
      where: { published: true },
      relations: ['department', 'createdBy'],
      order: { createdAt: 'DESC' },
      skip: (page - 1) * ANNOUNCEMENTS_PAGE_SIZE,
      take: ANNOUNCEMENTS_PAGE_SIZE,
    });

    return paginate(items, total, page, ANNOUNCEMENTS_PAGE_SIZE);
  }
}
