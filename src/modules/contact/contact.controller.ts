import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiTokenGuard } from '../../common/guards/api-token.guard';
import { ContactService } from './contact.service';
import { CreateContactMessageDto } from './dto/create-contact-message.dto';

@ApiTags('contact')
@Controller('contact')
export class ContactController {
  constructor(private readonly contactService: ContactService) {}

  @Post()
  @ApiOperation({ summary: 'Leave a message for the team' })
  async submit(@Body() dto: CreateContactMessageDto) {
    const message = await this.contactService.submit(dto);
    return { success: true, data: { id: message.id, createdAt: message.createdAt } };
  }

  @Get()
  @UseGuards(ApiTokenGuard)
  @ApiOperation({ summary: 'Newest contact messages (admin)' })
  @ApiQuery({ name: 'limit', required: false, example: 50 })
  async list(@Query('limit', new DefaultValuePipe(50), ParseIntPipe) limit: number) {
    const data = await this.contactService.list(Math.min(Math.max(limit, 1), 500));
    return { success: true, count: data.length, data };
  }
}
