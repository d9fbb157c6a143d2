import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Department } from '../../database/entities/department.entity';
import { Course } from '../../database/entities/course.entity';
import { Member, MemberStatus } from '../../database/entities/member.entity';
import { Project } from '../../database/entities/project.entity';
import { ClubEvent } from '../../database/entities/club-event.entity';
import referenceData from './data/reference-data.json';

export interface SeedSummary {
  departmentsCreated: number;
  departmentsExisting: number;
  coursesCreated: number;
  coursesUpdated: number;
  coursesExisting: number;
}

export const DETAIL_PROJECTS_LIMIT = 6;
export const DETAIL_EVENTS_LIMIT = 5;

export interface DepartmentDetail {
  department: Department;
  membersCount: number;
  projects: Project[];
  events: ClubEvent[];
}

export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/&/g, 'and')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

@Injectable()
export class DepartmentsService {
  private readonly logger = new Logger(DepartmentsService.name);

  constructor(
    @InjectRepository(Department)
    private readonly departmentRepository: Repository<Department>,
    @InjectRepository(Course)
    private readonly courseRepository: Repository<Course>,
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    @InjectRepository(Project)
    private readonly projectRepository: Repository<Project>,
    @InjectRepository(ClubEvent)
    private readonly eventRepository: Repository<ClubEvent>,
  ) {}

  async listDepartments(): Promise<Department[]> {
    return this.departmentRepository.find({
      relations: ['leader'],
      order: { name: 'ASC' },
    });
  }

  /**
   * Department page: leader, number of approved active members, featured
   * projects and latest events.
   */
  async getDepartmentDetail(slug: string): Promise<DepartmentDetail> {
    const department = await this.departmentRepository.findOne({
      where: { slug },
      relations: ['leader'],
    });
    if (!department) {
      throw new NotFoundException(`Department ${slug} not found`);
    }

    const [membersCount, projects, events] = await Promise.all([
      this.memberRepository.count({
        where: { departmentId: department.id, status: MemberStatus.APPROVED, isActive: true },
      }),
      this.projectRepository.find({
        where: { departmentId: department.id, featured: true },
        order: { createdAt: 'DESC' },
        take: DETAIL_PROJECTS_LIMIT,
      }),
      this.eventRepository.find({
        where: { departmentId: department.id },
        order: { eventDate: 'DESC' },
        take: DETAIL_EVENTS_LIMIT,
      }),
    ]);

    return { department, membersCount, projects, events };
  }

  async listCourses(): Promise<Course[]> {
    return this.courseRepository.find({ order: { name: 'ASC' } });
  }

  /**
   * Create the default departments and courses. Existing departments are
   * left alone; an existing course gets its code brought up to date.
   */
  async seedReferenceData(): Promise<SeedSummary> {
    const summary: SeedSummary = {
      departmentsCreated: 0,
      departmentsExisting: 0,
      coursesCreated: 0,
      coursesUpdated: 0,
      coursesExisting: 0,
    };

    for (const { name, description } of referenceData.departments) {
      const existing = await this.departmentRepository.findOne({ where: { name } });
      if (existing) {
        summary.departmentsExisting++;
        continue;
      }
      await this.departmentRepository.save(
        this.departmentRepository.create({ name, slug: slugify(name), description }),
      );
      summary.departmentsCreated++;
    }

    for (const { name, code } of referenceData.courses) {
      const existing = await this.courseRepository.findOne({ where: { name } });
      if (!existing) {
        await this.courseRepository.save(this.courseRepository.create({ name, code }));
        summary.coursesCreated++;
      } else if (existing.code !== code) {
        existing.code = code;
        await this.courseRepository.save(existing);
        summary.coursesUpdated++;
      } else {
        summary.coursesExisting++;
      }
    }

    this.logger.log(
      `Reference data seeded. Departments created: ${summary.departmentsCreated}, courses created: ${summary.coursesCreated}, courses updated: ${summary.coursesUpdated}`,
    );

    return summary;
  }
}
