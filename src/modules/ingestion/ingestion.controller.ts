import { ConflictException, Controller, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ApiTokenGuard } from '../../common/guards/api-token.guard';
import { IngestionService } from './ingestion.service';

@ApiTags('ingestion')
@Controller('ingestion')
@UseGuards(ApiTokenGuard)
export class IngestionController {
  constructor(private readonly ingestionService: IngestionService) {}

  @Post('run')
  @HttpCode(200)
  @ApiOperation({ summary: 'Run news, price, prediction, stats and sentiment ingestion now' })
  async run() {
    const report = await this.ingestionService.run();
    if (!report) {
      throw new ConflictException('An ingestion run is already in progress');
    }
    return { success: true, data: report };
  }
}
