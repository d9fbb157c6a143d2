import { Test, TestingModule } from '@nestjs/testing';
import { Reflector } from '@nestjs/core';
import { DepartmentsController } from '../departments.controller';
import { DepartmentsService } from '../departments.service';
import { IS_PUBLIC_KEY } from '../../auth/decorators/public.decorator';
import { SKIP_PICTURE_CHECK_KEY } from '../../../common/guards/picture-deadline.guard';
import { buildDepartment, buildMember } from '../../members/__tests__/member.fixtures';
import { buildEvent, buildProject } from '../../content/__tests__/content.fixtures';

describe('DepartmentsController', () => {
  let controller: DepartmentsController;

  const mockDepartmentsService = {
    listDepartments: jest.fn(),
    getDepartmentDetail: jest.fn(),
    listCourses: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [DepartmentsController],
      providers: [{ provide: DepartmentsService, useValue: mockDepartmentsService }],
    }).compile();

    controller = module.get<DepartmentsController>(DepartmentsController);
  });

  it('should return the department page', async () => {
    mockDepartmentsService.getDepartmentDetail.mockResolvedValue({
      department: buildDepartment({ leader: buildMember({ fullName: 'Jane Leader' }) }),
      membersCount: 3,
      projects: [buildProject()],
      events: [buildEvent()],
    });

    const result = await controller.getDepartment('software-development');

    expect(mockDepartmentsService.getDepartmentDetail).toHaveBeenCalledWith('software-development');
    expect(result).toEqual(
      expect.objectContaining({
        id: 'dept-software',
        slug: 'software-development',
        leaderName: 'Jane Leader',
        membersCount: 3,
      }),
    );
    expect(result.projects.map((project) => project.slug)).toEqual(['attendance-tracker']);
    expect(result.events.map((event) => event.title)).toEqual(['Intro to Git']);
  });

  it('should be public and exempt from the picture check', () => {
    const reflector = new Reflector();

    expect(reflector.get(IS_PUBLIC_KEY, DepartmentsController)).toBe(true);
    expect(reflector.get(SKIP_PICTURE_CHECK_KEY, DepartmentsController)).toBe(true);
  });
});
