import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Asset } from '../../entities/asset.entity';
import { News } from '../../entities/news.entity';
import { Sentiment } from '../../entities/sentiment.entity';
import { AiModule } from '../ai/ai.module';
import { SentimentService } from './sentiment.service';

@Module({
  imports: [TypeOrmModule.forFeature([Sentiment, Asset, News]), AiModule],
  providers: [SentimentService],
  exports: [SentimentService],
})
export class SentimentModule {}
