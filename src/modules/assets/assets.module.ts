import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Asset } from '../../entities/asset.entity';
import { AssetStats } from '../../entities/asset-stats.entity';
import { HistoricalPrice } from '../../entities/historical-price.entity';
import { News } from '../../entities/news.entity';
import { Sentiment } from '../../entities/sentiment.entity';
import { MarketDataModule } from '../market-data/market-data.module';
import { PredictionsModule } from '../predictions/predictions.module';
import { AssetsController } from './assets.controller';
import { AssetsService } from './assets.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Asset, AssetStats, HistoricalPrice, News, Sentiment]),
    MarketDataModule,
    PredictionsModule,
  ],
  controllers: [AssetsController],
  providers: [AssetsService],
  exports: [AssetsService],
})
export class AssetsModule {}
