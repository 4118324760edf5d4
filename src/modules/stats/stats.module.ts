import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AssetStats } from '../../entities/asset-stats.entity';
import { HistoricalPrice } from '../../entities/historical-price.entity';
import { StatsService } from './stats.service';

@Module({
  imports: [TypeOrmModule.forFeature([AssetStats, HistoricalPrice])],
  providers: [StatsService],
  exports: [StatsService],
})
export class StatsModule {}
