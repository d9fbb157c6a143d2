import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ContactMessage } from '../../database/entities/contact-message.entity';
import { MemberNotificationService } from '../members/services/member-notification.service';
import { ContactMessageDto } from './dto/contact-message.dto';

export interface ContactReceipt {
  id: string;
  delivered: number;
}

@Injectable()
export class ContactService {
  private readonly logger = new Logger(ContactService.name);

  constructor(
    @InjectRepository(ContactMessage)
    private readonly contactMessageRepository: Repository<ContactMessage>,
    private readonly memberNotificationService: MemberNotificationService,
  ) {}

  /**
   * Stores the message, then forwards it to the administrators. The stored
   * copy stands when forwarding fails; `delivered` reports how many
   * administrators were reached.
   */
  async submit(dto: ContactMessageDto): Promise<ContactReceipt> {
    const stored = await this.contactMessageRepository.save(
      this.contactMessageRepository.create({
        name: dto.name,
        email: dto.email,
        phone: dto.phone ?? '',
        subject: dto.subject,
        message: dto.message,
        responded: false,
      }),
    );

    let delivered = 0;
    try {
      const result = await this.memberNotificationService.sendContactMessage({
        name: dto.name,
        email: dto.email,
        subject: dto.subject,
        message: dto.message,
      });
      delivered = result.successful;
      if (result.successful === 0) {
        this.logger.error(
          `Contact message ${stored.id} was not forwarded (${result.failed} of ${result.total} failed)`,
        );
      } else {
        this.logger.log(`Contact message ${stored.id} forwarded to ${result.successful} recipients`);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Contact message ${stored.id} was not forwarded: ${reason}`);
    }

    return { id: stored.id, delivered };
  }
}
