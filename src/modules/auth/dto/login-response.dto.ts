import { ApiProperty } from '@nestjs/swagger';
import { MemberResponseDto } from '../../members/dto/member-response.dto';

export class LoginResponseDto {
  @ApiProperty({ example: 'jwt-access-token...' })
  accessToken!: string;

  @ApiProperty({ example: 'Bearer' })
  tokenType!: 'Bearer';

  @ApiProperty({ type: MemberResponseDto })
  member!: MemberResponseDto;
}
