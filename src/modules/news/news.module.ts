import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Asset } from '../../entities/asset.entity';
import { News } from '../../entities/news.entity';
import { SentimentModule } from '../sentiment/sentiment.module';
import { NewsController } from './news.controller';
import { NewsService } from './news.service';
import { NewsDataClient } from './newsdata.client';

@Module({
  imports: [TypeOrmModule.forFeature([News, Asset]), SentimentModule],
  controllers: [NewsController],
  providers: [NewsDataClient, NewsService],
  exports: [NewsService],
})
export class NewsModule {}
