import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { MembersModule } from '../members/members.module';
import { ContactController } from './contact.controller';
import { ContactService } from './contact.service';

@Module({
  imports: [DatabaseModule, MembersModule],
  controllers: [ContactController],
  providers: [ContactService],
})
export class ContactModule {}
