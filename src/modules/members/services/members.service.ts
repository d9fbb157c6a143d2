import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Member } from '../../../database/entities/member.entity';

@Injectable()
export class MembersService {
  private readonly logger = new Logger(MembersService.name);

  constructor(
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
  ) {}

  async findById(memberId: string): Promise<Member> {
    const member = await this.memberRepository.findOne({
      where: { id: memberId },
      relations: ['department', 'course'],
    });
    if (!member) {
      throw new NotFoundException(`Member ${memberId} not found`);
    }
    return member;
  }

  /**
   * Record where the uploaded picture was stored. A later upload replaces
   * the URL and timestamp; the deadline stays satisfied either way.
   */
  async recordPictureUpload(memberId: string, pictureUrl: string): Promise<Member> {
    const member = await this.findById(memberId);

    member.pictureUrl = pictureUrl;
    member.pictureUploadedAt = new Date();
    const saved = await this.memberRepository.save(member);

    this.logger.log(`Picture recorded for member ${saved.id}`);
    return saved;
  }
}
