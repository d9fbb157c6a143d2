import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Announcement, AnnouncementType } from '../../../database/entities/announcement.entity';

export class AnnouncementResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  title!: string;

  @ApiProperty()
  content!: string;

  @ApiProperty({ enum: AnnouncementType })
  type!: AnnouncementType;

  @ApiPropertyOptional({ nullable: true })
  departmentName!: string | null;

  @ApiPropertyOptional({ nullable: true })
  createdByName!: string | null;

  @ApiProperty()
  createdAt!: Date;

  static fromEntity(announcement: Announcement): AnnouncementResponseDto {
    return Object.assign(new AnnouncementResponseDto(), {
      id: announcement.id,
      title: announcement.title,
      content: announcement.content,
      type: announcement.type,
      departmentName: announcement.department?.name ?? null,
      createdByName: announcement.createdBy?.fullName ?? null,
      createdAt: announcement.createdAt,
    });
  }
}
