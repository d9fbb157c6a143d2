import { IsUrl, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

/**
 * The image itself goes to the object store; this records where it landed.
 */
export class UploadPictureDto {
  @ApiProperty({ example: 'https://cdn.example.com/members/member-1.jpg' })
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true }, { message: 'Picture URL must be a valid http(s) URL' })
  @MaxLength(500)
  pictureUrl!: string;
}
