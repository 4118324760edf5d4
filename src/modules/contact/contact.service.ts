import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ContactMessage } from '../../entities/contact-message.entity';
import { CreateContactMessageDto } from './dto/create-contact-message.dto';

@Injectable()
export class ContactService {
  private readonly logger = new Logger(ContactService.name);

  constructor(
    @InjectRepository(ContactMessage)
    private readonly messageRepository: Repository<ContactMessage>,
  ) {}

  async submit(dto: CreateContactMessageDto): Promise<ContactMessage> {
    const message = await this.messageRepository.save(
      this.messageRepository.create({
        name: dto.name.trim(),
        email: dto.email.trim().toLowerCase(),
        topic: dto.topic.trim(),
        message: dto.message.trim(),
      }),
    );
    this.logger.log(`Contact message ${message.id} received: ${message.topic}`);
    return message;
  }

  list(limit = 50): Promise<ContactMessage[]> {
    return this.messageRepository.find({ order: { createdAt: 'DESC' }, take: limit });
  }
}
