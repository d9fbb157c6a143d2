import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Member } from './entities/member.entity';
import { Department } from './entities/department.entity';
import { Course } from './entities/course.entity';
import { Project } from './entities/project.entity';
import { ClubEvent } from './entities/club-event.entity';
import { Announcement } from './entities/announcement.entity';
import { ContactMessage } from './entities/contact-message.entity';

export const DATABASE_ENTITIES = [
  Member,
  Department,
  Course,
  Project,
  ClubEvent,
  Announcement,
  ContactMessage,
];

@Module({
  imports: [TypeOrmModule.forFeature(DATABASE_ENTITIES)],
  exports: [TypeOrmModule],
})
export class DatabaseModule {}
