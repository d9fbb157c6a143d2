import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { NotFoundException } from '@nestjs/common';
import { ContentService } from '../content.service';
import { Project } from '../../../database/entities/project.entity';
import { ClubEvent } from '../../../database/entities/club-event.entity';
import { Announcement } from '../../../database/entities/announcement.entity';
import { buildAnnouncement, buildEvent, buildProject } from './content.fixtures';

describe('ContentService', () => {
  let service: ContentService;

  const mockProjectRepository = {
    findAndCount: jest.fn(),
    findOne: jest.fn(),
  };

  const mockEventRepository = {
    findAndCount: jest.fn(),
  };

  const mockAnnouncementRepository = {
    findAndCount: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ContentService,
        { provide: getRepositoryToken(Project), useValue: mockProjectRepository },
        { provide: getRepositoryToken(ClubEvent), useValue: mockEventRepository },
        { provide: getRepositoryToken(Announcement), useValue: mockAnnouncementRepository },
      ],
    }).compile();

    service = module.get<ContentService>(ContentService);
  });

  describe('listProjects', () => {
    it('should list featured projects first, twelve per page', async () => {
      const projects = [buildProject()];
      mockProjectRepository.findAndCount.mockResolvedValue([projects, 25]);

      const result = await service.listProjects({ page: 2 });

      expect(mockProjectRepository.findAndCount).toHaveBeenCalledWith({
        where: {},
        relations: ['department'],
        order: { featured: 'DESC', createdAt: 'DESC' },
        skip: 12,
        take: 12,
      });
      expect(result).toEqual({
        items: projects,
        pagination: { page: 2, limit: 12, total: 25, totalPages: 3 },
      });
    });

    it('should filter by department slug', async () => {
      mockProjectRepository.findAndCount.mockResolvedValue([[], 0]);

      const result = await service.listProjects({ department: 'programming' });

      expect(mockProjectRepository.findAndCount).toHaveBeenCalledWith(
        expect.objectContaining({ where: { department: { slug: 'programming' } }, skip: 0 }),
      );
      expect(result.pagination).toEqual({ page: 1, limit: 12, total: 0, totalPages: 0 });
    });
  });

  describe('getProject', () => {
    it('should load a project by slug with its department and author', async () => {
      const project = buildProject();
      mockProjectRepository.findOne.mockResolvedValue(project);

      await expect(service.getProject('attendance-tracker')).resolves.toBe(project);
      expect(mockProjectRepository.findOne).toHaveBeenCalledWith({
        where: { slug: 'attendance-tracker' },
        relations: ['department', 'createdBy'],
      });
    });

    it('should throw NotFoundException for an unknown slug', async () => {
      mockProjectRepository.findOne.mockResolvedValue(null);

      await expect(service.getProject('missing')).rejects.toThrow(
        new NotFoundException('Project missing not found'),
      );
    });
  });

  describe('listEvents', () => {
    it('should list events by date, latest first', async () => {
      const events = [buildEvent()];
      mockEventRepository.findAndCount.mockResolvedValue([events, 1]);

      const result = await service.listEvents({ department: 'networking' });

      expect(mockEventRepository.findAndCount).toHaveBeenCalledWith({
        where: { department: { slug: 'networking' } },
        relations: ['department'],
        order: { eventDate: 'DESC' },
        skip: 0,
        take: 12,
      });
      expect(result.items).toBe(events);
    });
  });

  describe('listAnnouncements', () => {
    it('should list only published announcements, ten per page', async () => {
      mockAnnouncementRepository.findAndCount.mockResolvedValue([[buildAnnouncement()], 11]);

      const result = await service.listAnnouncements({ page: 1 });

      expect(mockAnnouncementRepository.findAndCount).toHaveBeenCalledWith({
        where: { published: true },
        relations: ['department', 'createdBy'],
        order: { createdAt: 'DESC' },
        skip: 0,
        take: 10,
      });
      expect(result.pagination).toEqual({ page: 1, limit: 10, total: 11, totalPages: 2 });
    });
  });
});
