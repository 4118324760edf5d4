import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseEnumPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ApiTokenGuard } from '../../common/guards/api-token.guard';
import { AssetType } from '../../entities/asset.entity';
import { AssetsService } from './assets.service';
import { CreateAssetDto } from './dto/create-asset.dto';
import { PriceHistoryQueryDto } from './dto/price-history-query.dto';
import { RecordPriceDto } from './dto/record-price.dto';

@ApiTags('assets')
@Controller('assets')
export class AssetsController {
  constructor(private readonly assetsService: AssetsService) {}

  @Get()
  @ApiOperation({ summary: 'All assets ordered by ticker' })
  @ApiQuery({ name: 'type', required: false, enum: AssetType })
  async list(@Query('type', new ParseEnumPipe(AssetType, { optional: true })) assetType?: AssetType) {
    const data = await this.assetsService.listAssets(assetType);
    return { success: true, count: data.length, data };
  }

  @Get('catalog')
  @ApiOperation({ summary: 'Stocks and cryptocurrencies with live price, 24h change and sparkline' })
  @ApiQuery({ name: 'currency', required: false, enum: ['USD', 'EUR', 'RUB'] })
  async catalog(@Query('currency') currency?: string) {
    return { success: true, data: await this.assetsService.getCatalog(currency ?? 'USD') };
  }

  @Get(':ticker')
  @ApiOperation({ summary: 'Asset with stats, latest predictions, prices, news and sentiment' })
  async detail(@Param('ticker') ticker: string) {
    return { success: true, data: await this.assetsService.getAssetDetail(ticker) };
  }

  @Get(':ticker/prices')
  @ApiOperation({ summary: 'Daily price history, oldest first' })
  async prices(@Param('ticker') ticker: string, @Query() query: PriceHistoryQueryDto) {
    const data = await this.assetsService.getPriceHistory(
      ticker,
      query.from ? new Date(query.from) : undefined,
      query.to ? new Date(query.to) : undefined,
    );
    return { success: true, count: data.length, data };
  }

  @Get(':ticker/sparkline')
  @ApiOperation({ summary: '24h sparkline SVG' })
  @ApiQuery({ name: 'currency', required: false, enum: ['USD', 'EUR', 'RUB'] })
  async sparkline(@Param('ticker') ticker: string, @Query('currency') currency?: string) {
    return { success: true, data: await this.assetsService.getSparkline(ticker, currency ?? 'USD') };
  }

  @Post()
  @UseGuards(ApiTokenGuard)
  @ApiOperation({ summary: 'Create an asset (admin)' })
  async create(@Body() dto: CreateAssetDto) {
    return { success: true, data: await this.assetsService.createAsset(dto) };
  }

  @Post(':ticker/prices')
  @UseGuards(ApiTokenGuard)
  @ApiOperation({ summary: 'Record or replace a daily bar (admin)' })
  async recordPrice(@Param('ticker') ticker: string, @Body() dto: RecordPriceDto) {
    const { price, created } = await this.assetsService.recordPrice(ticker, dto);
    return { success: true, created, data: price };
  }

  @Delete(':ticker')
  @HttpCode(200)
  @UseGuards(ApiTokenGuard)
  @ApiOperation({ summary: 'Delete an asset and everything recorded for it (admin)' })
  async remove(@Param('ticker') ticker: string) {
    await this.assetsService.deleteAsset(ticker);
    return { success: true };
  }
}
