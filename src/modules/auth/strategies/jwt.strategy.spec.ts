import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Repository } from 'typeorm';
import { JwtStrategy } from './jwt.strategy';
import { Member } from '../../../database/entities/member.entity';
import { buildMember } from '../../members/__tests__/member.fixtures';

describe('JwtStrategy', () => {
  const mockMemberRepository = {
    findOne: jest.fn(),
  };

  const configService = {
    getOrThrow: jest.fn(() => 'test-secret-at-least-thirty-two-characters'),
  } as unknown as ConfigService;

  const strategy = new JwtStrategy(
    configService,
    mockMemberRepository as unknown as Repository<Member>,
  );

  it('should return the member named by the token subject', async () => {
    const member = buildMember();
    mockMemberRepository.findOne.mockResolvedValue(member);

    await expect(strategy.validate({ sub: 'member-1', email: 'john.doe@example.com' })).resolves.toBe(
      member,
    );
    expect(mockMemberRepository.findOne).toHaveBeenCalledWith({
      where: { id: 'member-1' },
      relations: ['department'],
    });
  });

  it('should reject a token for a missing member', async () => {
    mockMemberRepository.findOne.mockResolvedValue(null);

    await expect(strategy.validate({ sub: 'gone', email: 'gone@example.com' })).rejects.toThrow(
      new UnauthorizedException('Member not found'),
    );
  });

  it('should reject a deactivated member', async () => {
    mockMemberRepository.findOne.mockResolvedValue(buildMember({ isActive: false }));

    await expect(
      strategy.validate({ sub: 'member-1', email: 'john.doe@example.com' }),
    ).rejects.toThrow('Account has been deactivated');
  });
});
