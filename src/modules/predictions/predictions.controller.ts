import {
  Controller,
  DefaultValuePipe,
  Get,
  NotFoundException,
  Param,
  ParseIntPipe,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { ApiTokenGuard } from '../../common/guards/api-token.guard';
import { Asset } from '../../entities/asset.entity';
import { User } from '../../entities/user.entity';
import { UserAuthGuard } from '../auth/guards/user-auth.guard';
import { PredictionsService } from './predictions.service';

@ApiTags('predictions')
@Controller('predictions')
export class PredictionsController {
  constructor(
    private readonly predictionsService: PredictionsService,
    @InjectRepository(Asset) private readonly assetRepository: Repository<Asset>,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Newest predictions with their direction against the current price' })
  @ApiQuery({ name: 'limit', required: false, example: 10 })
  async listLatest(@Query('limit', new DefaultValuePipe(10), ParseIntPipe) limit: number) {
    const data = await this.predictionsService.listLatest(Math.min(Math.max(limit, 1), 100));
    return { success: true, count: data.length, data };
  }

  @Get(':id')
  @UseGuards(UserAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'View one prediction (7D and 30D need a premium plan)' })
  async view(@CurrentUser() user: User, @Param('id', ParseUUIDPipe) id: string) {
    return { success: true, data: await this.predictionsService.viewPrediction(user, id) };
  }

  @Post('generate/:ticker')
  @UseGuards(ApiTokenGuard)
  @ApiOperation({ summary: 'Generate today\'s predictions for one asset from stored prices' })
  async generate(@Param('ticker') ticker: string) {
    const asset = await this.assetRepository.findOne({ where: { ticker: ticker.toUpperCase() } });
    if (!asset) {
      throw new NotFoundException(`Asset ${ticker} not found`);
    }
    return { success: true, data: await this.predictionsService.generateForAsset(asset) };
  }
}
