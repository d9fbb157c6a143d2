import {
  Controller,
  Post,
  Get,
  Body,
  Param,
  ParseUUIDPipe,
  HttpCode,
  HttpStatus,
  Req,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth } from '@nestjs/swagger';
import { RegistrationService } from './services/registration.service';
import { ApprovalService } from './services/approval.service';
import { MembersService } from './services/members.service';
import { RegisterMemberDto } from './dto/register-member.dto';
import { RejectMemberDto } from './dto/reject-member.dto';
import { UploadPictureDto } from './dto/upload-picture.dto';
import { MemberResponseDto } from './dto/member-response.dto';
import { Public } from '../auth/decorators/public.decorator';
import { AuthenticatedRequest } from '../auth/interfaces/authenticated-request.interface';
import { SkipPictureCheck } from '../../common/decorators/skip-picture-check.decorator';

@ApiTags('Members')
@Controller('api/members')
export class MembersController {
  constructor(
    private readonly registrationService: RegistrationService,
    private readonly approvalService: ApprovalService,
    private readonly membersService: MembersService,
  ) {}

  @Post('register')
  @Public()
  @SkipPictureCheck()
  @ApiOperation({ summary: 'Register a new member (pending approval)' })
  @ApiResponse({ status: 201, description: 'Member registered', type: MemberResponseDto })
  @ApiResponse({ status: 400, description: 'Itemized validation errors' })
  async register(@Body() dto: RegisterMemberDto): Promise<MemberResponseDto> {
    const member = await this.registrationService.register(dto);
    return MemberResponseDto.fromEntity(member);
  }

  @Get('me')
  @SkipPictureCheck()
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Current member profile, including the picture deadline' })
  @ApiResponse({ status: 200, type: MemberResponseDto })
  async me(@Req() req: AuthenticatedRequest): Promise<MemberResponseDto> {
    const member = await this.membersService.findById(req.user.id);
    return MemberResponseDto.fromEntity(member);
  }

  @Post('me/picture')
  @SkipPictureCheck()
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Record the uploaded profile picture' })
  @ApiResponse({ status: 200, type: MemberResponseDto })
  async uploadPicture(
    @Req() req: AuthenticatedRequest,
    @Body() dto: UploadPictureDto,
  ): Promise<MemberResponseDto> {
    const member = await this.membersService.recordPictureUpload(req.user.id, dto.pictureUrl);
    return MemberResponseDto.fromEntity(member);
  }

  @Get('pending')
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Pending registrations the caller may review' })
  @ApiResponse({ status: 200, type: [MemberResponseDto] })
  @ApiResponse({ status: 403, description: 'Caller is neither admin nor department leader' })
  async listPending(@Req() req: AuthenticatedRequest): Promise<MemberResponseDto[]> {
    const members = await this.approvalService.listPending(req.user);
    return members.map((member) => MemberResponseDto.fromEntity(member));
  }

  @Post(':id/approve')
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Approve a pending member' })
  @ApiResponse({ status: 200, type: MemberResponseDto })
  @ApiResponse({ status: 403, description: 'Not admin or leader of the member department' })
  @ApiResponse({ status: 404, description: 'Member not found' })
  @ApiResponse({ status: 409, description: 'Member is not pending' })
  async approve(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
  ): Promise<MemberResponseDto> {
    const member = await this.approvalService.approve(id, req.user);
    return MemberResponseDto.fromEntity(member);
  }

  @Post(':id/reject')
  @HttpCode(HttpStatus.OK)
  @ApiBearerAuth('JWT-auth')
  @ApiOperation({ summary: 'Reject a pending member' })
  @ApiResponse({ status: 200, type: MemberResponseDto })
  @ApiResponse({ status: 403, description: 'Not admin or leader of the member department' })
  @ApiResponse({ status: 404, description: 'Member not found' })
  @ApiResponse({ status: 409, description: 'Member is not pending' })
  async reject(
    @Param('id', ParseUUIDPipe) id: string,
    @Req() req: AuthenticatedRequest,
    @Body() dto: RejectMemberDto,
  ): Promise<MemberResponseDto> {
    const member = await this.approvalService.reject(id, req.user, dto.reason);
    return MemberResponseDto.fromEntity(member);
  }
}
