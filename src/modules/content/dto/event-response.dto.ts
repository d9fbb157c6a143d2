import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ClubEvent } from '../../../database/entities/club-event.entity';

export class EventResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  title!: string;

  @ApiProperty()
  description!: string;

  @ApiProperty()
  eventDate!: Date;

  @ApiProperty()
  location!: string;

  @ApiPropertyOptional({ nullable: true })
  imageUrl!: string | null;

  @ApiPropertyOptional({ nullable: true })
  departmentName!: string | null;

  @ApiPropertyOptional({ nullable: true })
  departmentSlug!: string | null;

  static fromEntity(event: ClubEvent): EventResponseDto {
    return Object.assign(new EventResponseDto(), {
      id: event.id,
      title: event.title,
      description: event.description,
      eventDate: event.eventDate,
      location: event.location,
      imageUrl: event.imageUrl,
      departmentName: event.department?.name ?? null,
      departmentSlug: event.department?.slug ?? null,
    });
  }
}
