import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DepartmentsService, slugify } from '../departments.service';
import { Department } from '../../../database/entities/department.entity';
import { NotFoundException } from '@nestjs/common';
import { Course } from '../../../database/entities/course.entity';
import { Member, MemberStatus } from '../../../database/entities/member.entity';
import { Project } from '../../../database/entities/project.entity';
import { ClubEvent } from '../../../database/entities/club-event.entity';
import { buildCourse, buildDepartment } from '../../members/__tests__/member.fixtures';
import { buildEvent, buildProject } from '../../content/__tests__/content.fixtures';

describe('DepartmentsService', () => {
  let service: DepartmentsService;

  const mockDepartmentRepository = {
    find: jest.fn(),
    findOne: jest.fn(),
    create: jest.fn(),
    save: jest.fn(),
  };

  const mockCourseRepository = {
    find: jest.fn(),
    findOne: jest.fn(),
    create: jest.fn(),
    save: jest.fn(),
  };

  const mockMemberRepository = {
    count: jest.fn(),
  };

  const mockProjectRepository = {
    find: jest.fn(),
  };

  const mockEventRepository = {
    find: jest.fn(),
  };

  beforeEach(async () => {
    mockDepartmentRepository.create.mockImplementation((data: Partial<Department>) => data);
    mockDepartmentRepository.save.mockImplementation(async (data: Partial<Department>) => data);
    mockCourseRepository.create.mockImplementation((data: Partial<Course>) => data);
    mockCourseRepository.save.mockImplementation(async (data: Partial<Course>) => data);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DepartmentsService,
        { provide: getRepositoryToken(Department), useValue: mockDepartmentRepository },
        { provide: getRepositoryToken(Course), useValue: mockCourseRepository },
        { provide: getRepositoryToken(Member), useValue: mockMemberRepository },
        { provide: getRepositoryToken(Project), useValue: mockProjectRepository },
        { provide: getRepositoryToken(ClubEvent), useValue: mockEventRepository },
      ],
    }).compile();

    service = module.get<DepartmentsService>(DepartmentsService);
  });

  describe('slugify', () => {
    it('should build URL-safe slugs', () => {
      expect(slugify('AI & Machine Learning')).toBe('ai-and-machine-learning');
      expect(slugify(' Computer Maintenance ')).toBe('computer-maintenance');
    });
  });

  it('should list departments by name with their leader', async () => {
    mockDepartmentRepository.find.mockResolvedValue([buildDepartment()]);

    await service.listDepartments();

    expect(mockDepartmentRepository.find).toHaveBeenCalledWith({
      relations: ['leader'],
      order: { name: 'ASC' },
    });
  });

  describe('getDepartmentDetail', () => {
    it('should gather members count, featured projects and latest events', async () => {
      const department = buildDepartment();
      const projects = [buildProject()];
      const events = [buildEvent({ departmentId: 'dept-software' })];
      mockDepartmentRepository.findOne.mockResolvedValue(department);
      mockMemberRepository.count.mockResolvedValue(14);
      mockProjectRepository.find.mockResolvedValue(projects);
      mockEventRepository.find.mockResolvedValue(events);

      const detail = await service.getDepartmentDetail('software-development');

      expect(mockDepartmentRepository.findOne).toHaveBeenCalledWith({
        where: { slug: 'software-development' },
        relations: ['leader'],
      });
      expect(mockMemberRepository.count).toHaveBeenCalledWith({
        where: { departmentId: 'dept-software', status: MemberStatus.APPROVED, isActive: true },
      });
      expect(mockProjectRepository.find).toHaveBeenCalledWith({
        where: { departmentId: 'dept-software', featured: true },
        order: { createdAt: 'DESC' },
        take: 6,
      });
      expect(mockEventRepository.find).toHaveBeenCalledWith({
        where: { departmentId: 'dept-software' },
        order: { eventDate: 'DESC' },
        take: 5,
      });
      expect(detail).toEqual({ department, membersCount: 14, projects, events });
    });

    it('should throw NotFoundException for an unknown slug', async () => {
      mockDepartmentRepository.findOne.mockResolvedValue(null);

      await expect(service.getDepartmentDetail('astronomy')).rejects.toThrow(
        new NotFoundException('Department astronomy not found'),
      );
      expect(mockMemberRepository.count).not.toHaveBeenCalled();
    });
  });

  it('should list courses by name', async () => {
    mockCourseRepository.find.mockResolvedValue([buildCourse()]);

    await expect(service.listCourses()).resolves.toHaveLength(1);
    expect(mockCourseRepository.find).toHaveBeenCalledWith({ order: { name: 'ASC' } });
  });

  describe('seedReferenceData', () => {
    it('should create every department and course on an empty database', async () => {
      mockDepartmentRepository.findOne.mockResolvedValue(null);
      mockCourseRepository.findOne.mockResolvedValue(null);

      const summary = await service.seedReferenceData();

      expect(summary).toEqual({
        departmentsCreated: 6,
        departmentsExisting: 0,
        coursesCreated: 9,
        coursesUpdated: 0,
        coursesExisting: 0,
      });
      expect(mockDepartmentRepository.create).toHaveBeenCalledWith({
        name: 'AI & Machine Learning',
        slug: 'ai-and-machine-learning',
        description: 'Automation, data analysis and intelligent prototypes.',
      });
    });

    it('should leave existing rows and fix outdated course codes', async () => {
      mockDepartmentRepository.findOne.mockResolvedValue(buildDepartment());
      mockCourseRepository.findOne.mockImplementation(async ({ where }: { where: { name: string } }) =>
        where.name === 'Master of Business Administration'
          ? buildCourse({ name: where.name, code: 'OLD' })
          : buildCourse({ name: where.name, code: null }),
      );

      const summary = await service.seedReferenceData();

      expect(summary.departmentsCreated).toBe(0);
      expect(summary.departmentsExisting).toBe(6);
      expect(summary.coursesCreated).toBe(0);
      expect(summary.coursesUpdated).toBe(9);
      expect(mockCourseRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({ name: 'Master of Business Administration', code: 'MBA' }),
      );
    });

    it('should count courses already up to date', async () => {
      mockDepartmentRepository.findOne.mockResolvedValue(buildDepartment());
      mockCourseRepository.findOne.mockImplementation(async ({ where }: { where: { name: string } }) =>
        where.name === 'Master of Business Administration'
          ? buildCourse({ name: where.name, code: 'MBA' })
          : null,
      );

      const summary = await service.seedReferenceData();

      expect(summary.coursesExisting).toBe(1);
      expect(summary.coursesCreated).toBe(8);
    });
  });
});
