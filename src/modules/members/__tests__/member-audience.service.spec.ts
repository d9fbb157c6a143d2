import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ILike, In } from 'typeorm';
import { MemberAudienceService, escapeLikePattern } from '../services/member-audience.service';
import { Member, MemberStatus } from '../../../database/entities/member.entity';
import { Department } from '../../../database/entities/department.entity';
import { buildDepartment } from './member.fixtures';

describe('MemberAudienceService', () => {
  let service: MemberAudienceService;

  const mockMemberRepository = {
    find: jest.fn(),
  };

  const mockDepartmentRepository = {
    findOne: jest.fn(),
  };

  beforeEach(async () => {
    mockMemberRepository.find.mockResolvedValue([
      { id: 'member-1', email: 'john.doe@example.com' },
      { id: 'member-2', email: 'jane.roe@example.com' },
    ]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MemberAudienceService,
        { provide: getRepositoryToken(Member), useValue: mockMemberRepository },
        { provide: getRepositoryToken(Department), useValue: mockDepartmentRepository },
      ],
    }).compile();

    service = module.get<MemberAudienceService>(MemberAudienceService);
  });

  it('should resolve all_members to every active member', async () => {
    const emails = await service.resolve('all_members');

    expect(emails).toEqual(['john.doe@example.com', 'jane.roe@example.com']);
    expect(mockMemberRepository.find).toHaveBeenCalledWith({
      where: { isActive: true },
      select: { id: true, email: true },
      order: { registeredAt: 'ASC' },
    });
  });

  it('should resolve approved_members', async () => {
    await service.resolve('approved_members');

    expect(mockMemberRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({ where: { isActive: true, status: MemberStatus.APPROVED } }),
    );
  });

  it('should resolve pending_members', async () => {
    await service.resolve(' pending_members ');

    expect(mockMemberRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({ where: { isActive: true, status: MemberStatus.PENDING } }),
    );
  });

  it('should resolve a department by partial name', async () => {
    mockDepartmentRepository.findOne.mockResolvedValue(buildDepartment());

    await service.resolve('department:software');

    expect(mockDepartmentRepository.findOne).toHaveBeenCalledWith({
      where: { name: ILike('%software%') },
      order: { name: 'ASC' },
    });
    expect(mockMemberRepository.find).toHaveBeenCalledWith(
      expect.objectContaining({ where: { isActive: true, departmentId: 'dept-software' } }),
    );
  });

  it('should accept keyword selectors in any case', async () => {
    await service.resolve('ALL_MEMBERS');
    await service.resolve('Approved_Members');

    expect(mockMemberRepository.find).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ where: { isActive: true } }),
    );
    expect(mockMemberRepository.find).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ where: { isActive: true, status: MemberStatus.APPROVED } }),
    );
  });

  it('should accept the department prefix in any case', async () => {
    mockDepartmentRepository.findOne.mockResolvedValue(buildDepartment());

    await service.resolve('Department:Software');

    expect(mockDepartmentRepository.findOne).toHaveBeenCalledWith({
      where: { name: ILike('%Software%') },
      order: { name: 'ASC' },
    });
  });

  it('should match wildcard characters in a department name literally', async () => {
    mockDepartmentRepository.findOne.mockResolvedValue(buildDepartment());

    await service.resolve('department:100%_ai');

    expect(mockDepartmentRepository.findOne).toHaveBeenCalledWith({
      where: { name: ILike('%100\\%\\_ai%') },
      order: { name: 'ASC' },
    });
  });

  it('should escape LIKE metacharacters', () => {
    expect(escapeLikePattern('a%b_c\\d')).toBe('a\\%b\\_c\\\\d');
  });

  it('should throw NotFoundException for an unknown department', async () => {
    mockDepartmentRepository.findOne.mockResolvedValue(null);

    await expect(service.resolve('department:astronomy')).rejects.toThrow(
      new NotFoundException('Department not found: astronomy'),
    );
  });

  it('should require a department name', async () => {
    await expect(service.resolve('department:')).rejects.toThrow(BadRequestException);
  });

  it('should pass an explicit list through, minus inactive members', async () => {
    mockMemberRepository.find.mockResolvedValueOnce([
      { id: 'member-3', email: 'gone@example.com' },
    ]);

    const emails = await service.resolve('a@example.com, Gone@Example.com ,b@example.com');

    expect(emails).toEqual(['a@example.com', 'b@example.com']);
    expect(mockMemberRepository.find).toHaveBeenCalledWith({
      where: {
        email: In(['a@example.com', 'gone@example.com', 'b@example.com']),
        isActive: false,
      },
      select: { id: true, email: true },
    });
  });

  it('should reject an empty target', async () => {
    await expect(service.resolve('   ')).rejects.toThrow('Audience target is required');
  });

  it('should reject a list with no addresses', async () => {
    await expect(service.resolve(' , ,')).rejects.toThrow(BadRequestException);
    expect(mockMemberRepository.find).not.toHaveBeenCalled();
  });
});
