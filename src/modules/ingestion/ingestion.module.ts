import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LockService } from '../../common/services/lock.service';
import { Asset } from '../../entities/asset.entity';
import { AssetsModule } from '../assets/assets.module';
import { AuthModule } from '../auth/auth.module';
import { MarketDataModule } from '../market-data/market-data.module';
import { NewsModule } from '../news/news.module';
import { PredictionsModule } from '../predictions/predictions.module';
import { SentimentModule } from '../sentiment/sentiment.module';
import { StatsModule } from '../stats/stats.module';
import { IngestionController } from './ingestion.controller';
import { IngestionService } from './ingestion.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Asset]),
    AssetsModule,
    AuthModule,
    MarketDataModule,
    NewsModule,
    PredictionsModule,
    SentimentModule,
    StatsModule,
  ],
  controllers: [IngestionController],
  providers: [IngestionService, LockService],
})
export class IngestionModule {}
