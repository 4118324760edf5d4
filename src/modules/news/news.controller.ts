import {
  Controller,
  DefaultValuePipe,
  Get,
  ParseEnumPipe,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiTokenGuard } from '../../common/guards/api-token.guard';
import { AssetType } from '../../entities/asset.entity';
import { SentimentService } from '../sentiment/sentiment.service';
import { NewsService } from './news.service';

@ApiTags('analytics')
@Controller()
export class NewsController {
  constructor(
    private readonly newsService: NewsService,
    private readonly sentimentService: SentimentService,
  ) {}

  @Get('news')
  @ApiOperation({ summary: 'Stored news, newest first' })
  @ApiQuery({ name: 'type', required: false, enum: AssetType })
  @ApiQuery({ name: 'limit', required: false, example: 10 })
  async getFeed(
    @Query('type', new ParseEnumPipe(AssetType, { optional: true })) assetType: AssetType | undefined,
    @Query('limit', new DefaultValuePipe(10), ParseIntPipe) limit: number,
  ) {
    const data = await this.newsService.getFeed({ assetType, limit: Math.min(Math.max(limit, 1), 100) });
    return { success: true, count: data.length, data };
  }

  /**
   * Crypto news (refreshed when stale) next to the latest crypto sentiment.
   */
  @Get('analytics/news')
  @ApiOperation({ summary: 'Crypto news and sentiment feed' })
  async getAnalytics() {
    const news = await this.newsService.refreshCryptoFeed(10);

    let sentiments = await this.sentimentService.getSentimentFeed(10);
    if (!sentiments.length) {
      await this.sentimentService.generateForCrypto();
      sentiments = await this.sentimentService.getSentimentFeed(10);
    }

    return { success: true, data: { news, sentiments } };
  }

  @Get('sentiments')
  @ApiOperation({ summary: 'Latest sentiment scores' })
  @ApiQuery({ name: 'type', required: false, enum: AssetType })
  async getSentiments(
    @Query('type', new ParseEnumPipe(AssetType, { optional: true })) assetType: AssetType | undefined,
    @Query('limit', new DefaultValuePipe(10), ParseIntPipe) limit: number,
  ) {
    const data = await this.sentimentService.getSentimentFeed(
      Math.min(Math.max(limit, 1), 100),
      assetType ?? AssetType.CRYPTO,
    );
    return { success: true, count: data.length, data };
  }

  @Post('news/refresh')
  @UseGuards(ApiTokenGuard)
  @ApiOperation({ summary: 'Fetch the configured news category now' })
  async refresh() {
    return { success: true, data: { created: await this.newsService.refreshBusinessNews() } };
  }
}
