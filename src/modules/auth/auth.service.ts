import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { Member } from '../../database/entities/member.entity';
import { LoginDto } from './dto/login.dto';
import { LoginResponseDto } from './dto/login-response.dto';
import { JwtPayload } from './interfaces/jwt-payload.interface';
import { MemberResponseDto } from '../members/dto/member-response.dto';

/**
 * Compared against when no member matches, so an unknown identifier costs
 * the same bcrypt round as a wrong password.
 */
const DUMMY_PASSWORD_HASH = '$2b$12$C6UzMDM.H6dfI/f/IKcEeO5Qn2xFYTz6JpQ1oR6/TFkQWzT1u7XbK';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    private readonly jwtService: JwtService,
  ) {}

  /**
   * Pending and rejected members may sign in; what they can do afterwards
   * depends on their status. Inactive members cannot.
   */
  async login(loginDto: LoginDto): Promise<LoginResponseDto> {
    const identifier = loginDto.identifier.trim();

    // 1. Registration numbers are stored upper-case, emails lower-case
    const member = await this.memberRepository.findOne({
      where: [{ email: identifier.toLowerCase() }, { regNumber: identifier.toUpperCase() }],
      relations: ['department', 'course'],
    });

    // 2. Compare even without a match
    const isPasswordValid = await bcrypt.compare(
      loginDto.password,
      member ? member.passwordHash : DUMMY_PASSWORD_HASH,
    );

    if (!member || !isPasswordValid) {
      this.logger.warn(`Failed login attempt for identifier: ${identifier}`);
      throw new UnauthorizedException('Invalid credentials');
    }

    if (!member.isActive) {
      this.logger.warn(`Login refused for inactive member ${member.id}`);
      throw new UnauthorizedException('Invalid credentials');
    }

    // 3. Issue the access token
    const payload: JwtPayload = { sub: member.id, email: member.email };
    const accessToken = this.jwtService.sign(payload);

    this.logger.log(`Member ${member.id} logged in`);

    return {
      accessToken,
      tokenType: 'Bearer',
      member: MemberResponseDto.fromEntity(member),
    };
  }
}
