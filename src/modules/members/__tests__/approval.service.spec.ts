import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { ApprovalService } from '../services/approval.service';
import { MemberNotificationService } from '../services/member-notification.service';
import { PermissionService } from '../../../common/services/permission.service';
import { Member, MemberStatus } from '../../../database/entities/member.entity';
import { Department } from '../../../database/entities/department.entity';
import { InvalidStateTransitionException } from '../exceptions/invalid-state-transition.exception';
import { buildAdmin, buildDepartment, buildMember } from './member.fixtures';

describe('ApprovalService', () => {
  let service: ApprovalService;

  const mockMemberRepository = {
    findOne: jest.fn(),
    find: jest.fn(),
    save: jest.fn(),
  };

  const mockDepartmentRepository = {
    findOne: jest.fn(),
  };

  const mockNotificationService = {
    notifyApproved: jest.fn(),
    notifyRejected: jest.fn(),
  };

  const admin = buildAdmin();
  const leader = buildMember({
    id: 'leader-1',
    email: 'leader@example.com',
    status: MemberStatus.APPROVED,
  });
  const outsider = buildMember({ id: 'member-9', email: 'outsider@example.com' });

  beforeEach(async () => {
    mockMemberRepository.save.mockImplementation(async (member: Member) => member);
    mockNotificationService.notifyApproved.mockResolvedValue({ success: true });
    mockNotificationService.notifyRejected.mockResolvedValue({ success: true });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ApprovalService,
        PermissionService,
        { provide: getRepositoryToken(Member), useValue: mockMemberRepository },
        { provide: getRepositoryToken(Department), useValue: mockDepartmentRepository },
        { provide: MemberNotificationService, useValue: mockNotificationService },
      ],
    }).compile();

    service = module.get<ApprovalService>(ApprovalService);
  });

  function pendingMember(): Member {
    return buildMember({ department: buildDepartment() });
  }

  describe('approve', () => {
    it('should approve a pending member as system admin', async () => {
      mockMemberRepository.findOne.mockResolvedValue(pendingMember());

      const result = await service.approve('member-1', admin);

      expect(result.status).toBe(MemberStatus.APPROVED);
      expect(result.approvedAt).toBeInstanceOf(Date);
      expect(result.rejectedAt).toBeNull();
      expect(mockMemberRepository.save).toHaveBeenCalledTimes(1);
      expect(mockNotificationService.notifyApproved).toHaveBeenCalledWith(result);
    });

    it('should let the department leader approve', async () => {
      mockMemberRepository.findOne.mockResolvedValue(pendingMember());

      const result = await service.approve('member-1', leader);

      expect(result.status).toBe(MemberStatus.APPROVED);
    });

    it('should load the department when the relation is missing', async () => {
      mockMemberRepository.findOne.mockResolvedValue(buildMember());
      mockDepartmentRepository.findOne.mockResolvedValue(buildDepartment());

      await service.approve('member-1', leader);

      expect(mockDepartmentRepository.findOne).toHaveBeenCalledWith({
        where: { id: 'dept-software' },
      });
    });

    it('should forbid members who do not lead the department and leave the member unchanged', async () => {
      const member = pendingMember();
      const before = structuredClone(member);
      mockMemberRepository.findOne.mockResolvedValue(member);

      await expect(service.approve('member-1', outsider)).rejects.toThrow(ForbiddenException);

      expect(member).toEqual(before);
      expect(member.status).toBe(MemberStatus.PENDING);
      expect(member.approvedAt).toBeNull();
      expect(mockMemberRepository.save).not.toHaveBeenCalled();
      expect(mockNotificationService.notifyApproved).not.toHaveBeenCalled();
    });

    it('should throw NotFoundException for an unknown member', async () => {
      mockMemberRepository.findOne.mockResolvedValue(null);

      await expect(service.approve('missing', admin)).rejects.toThrow(NotFoundException);
    });

    it('should refuse to approve a member twice', async () => {
      mockMemberRepository.findOne.mockResolvedValue(
        buildMember({
          status: MemberStatus.APPROVED,
          approvedAt: new Date('2025-03-02T00:00:00Z'),
          department: buildDepartment(),
        }),
      );

      await expect(service.approve('member-1', admin)).rejects.toThrow(
        new InvalidStateTransitionException(MemberStatus.APPROVED, MemberStatus.APPROVED),
      );
      expect(mockMemberRepository.save).not.toHaveBeenCalled();
      expect(mockNotificationService.notifyApproved).not.toHaveBeenCalled();
    });

    it('should check permission before state', async () => {
      mockMemberRepository.findOne.mockResolvedValue(
        buildMember({ status: MemberStatus.REJECTED, department: buildDepartment() }),
      );

      await expect(service.approve('member-1', outsider)).rejects.toThrow(ForbiddenException);
    });

    it('should keep the approval when the email fails', async () => {
      mockMemberRepository.findOne.mockResolvedValue(pendingMember());
      mockNotificationService.notifyApproved.mockResolvedValueOnce({
        success: false,
        error: 'smtp down',
      });

      const result = await service.approve('member-1', admin);

      expect(result.status).toBe(MemberStatus.APPROVED);
    });
  });

  describe('reject', () => {
    it('should reject a pending member and send the reason', async () => {
      mockMemberRepository.findOne.mockResolvedValue(pendingMember());

      const result = await service.reject('member-1', admin, 'Unknown registration number');

      expect(result.status).toBe(MemberStatus.REJECTED);
      expect(result.rejectedAt).toBeInstanceOf(Date);
      expect(result.approvedAt).toBeNull();
      expect(mockNotificationService.notifyRejected).toHaveBeenCalledWith(
        result,
        'Unknown registration number',
      );
    });

    it('should pass no reason when the reason is empty', async () => {
      mockMemberRepository.findOne.mockResolvedValue(pendingMember());

      const result = await service.reject('member-1', leader, '');

      expect(mockNotificationService.notifyRejected).toHaveBeenCalledWith(result, undefined);
    });

    it('should forbid outsiders and leave the member unchanged', async () => {
      const member = pendingMember();
      const before = structuredClone(member);
      mockMemberRepository.findOne.mockResolvedValue(member);

      await expect(service.reject('member-1', outsider, 'Not a student')).rejects.toThrow(
        ForbiddenException,
      );

      expect(member).toEqual(before);
      expect(member.status).toBe(MemberStatus.PENDING);
      expect(member.rejectedAt).toBeNull();
      expect(mockMemberRepository.save).not.toHaveBeenCalled();
      expect(mockNotificationService.notifyRejected).not.toHaveBeenCalled();
    });

    it('should refuse to reject an approved member', async () => {
      mockMemberRepository.findOne.mockResolvedValue(
        buildMember({ status: MemberStatus.APPROVED, department: buildDepartment() }),
      );

      await expect(service.reject('member-1', admin)).rejects.toThrow(
        'Cannot change member status from approved to rejected: only pending members can be reviewed',
      );
    });
  });

  describe('listPending', () => {
    it('should list every pending member for system admins', async () => {
      const pending = [pendingMember()];
      mockMemberRepository.find.mockResolvedValue(pending);

      const result = await service.listPending(admin);

      expect(result).toBe(pending);
      expect(mockDepartmentRepository.findOne).not.toHaveBeenCalled();
      expect(mockMemberRepository.find).toHaveBeenCalledWith({
        where: { status: MemberStatus.PENDING },
        relations: ['department', 'course'],
        order: { registeredAt: 'ASC' },
      });
    });

    it('should limit department leaders to their department', async () => {
      mockDepartmentRepository.findOne.mockResolvedValue(buildDepartment());
      mockMemberRepository.find.mockResolvedValue([]);

      await service.listPending(leader);

      expect(mockDepartmentRepository.findOne).toHaveBeenCalledWith({
        where: { leaderId: 'leader-1' },
      });
      expect(mockMemberRepository.find).toHaveBeenCalledWith({
        where: { status: MemberStatus.PENDING, departmentId: 'dept-software' },
        relations: ['department', 'course'],
        order: { registeredAt: 'ASC' },
      });
    });

    it('should forbid regular members', async () => {
      mockDepartmentRepository.findOne.mockResolvedValue(null);

      await expect(service.listPending(outsider)).rejects.toThrow(
        'Only system admins and department leaders can review members',
      );
      expect(mockMemberRepository.find).not.toHaveBeenCalled();
    });
  });
});
