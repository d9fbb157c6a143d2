import { Controller, Post, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { ContactService, ContactReceipt } from './contact.service';
import { ContactMessageDto } from './dto/contact-message.dto';
import { Public } from '../auth/decorators/public.decorator';
import { SkipPictureCheck } from '../../common/decorators/skip-picture-check.decorator';

@ApiTags('Contact')
@Controller('api/contact')
export class ContactController {
  constructor(private readonly contactService: ContactService) {}

  @Post()
  @Public()
  @SkipPictureCheck()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Send a message to the club administrators' })
  @ApiResponse({ status: 202, description: 'Message stored; delivered counts the administrators reached' })
  @ApiResponse({ status: 400, description: 'Validation failed' })
  async submit(@Body() dto: ContactMessageDto): Promise<ContactReceipt> {
    return this.contactService.submit(dto);
  }
}
