import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy, ExtractJwt } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Member } from '../../../database/entities/member.entity';
import { JwtPayload } from '../interfaces/jwt-payload.interface';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
    });
  }

  /**
   * The returned member becomes request.user.
   */
  async validate(payload: JwtPayload): Promise<Member> {
    const member = await this.memberRepository.findOne({
      where: { id: payload.sub },
      relations: ['department'],
    });

    if (!member) {
      throw new UnauthorizedException('Member not found');
    }

    if (!member.isActive) {
      throw new UnauthorizedException('Account has been deactivated');
    }

    return member;
  }
}
