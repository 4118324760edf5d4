import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Asset, AssetType } from '../../entities/asset.entity';
import { News } from '../../entities/news.entity';
import { Sentiment } from '../../entities/sentiment.entity';
import { errorMessage } from '../../utils/errors';
import { RANDOM_SOURCE, RandomSource } from '../../utils/random';
import { AiService } from '../ai/ai.service';

export const SENTIMENT_SOURCE_TYPES = ['Twitter', 'Reddit', 'News', 'Forum', 'Telegram'] as const;

const HEADLINES_PER_ASSET = 5;

export function normalizeScore(score: number): number {
  const clamped = Math.min(1, Math.max(0, score));
  return Math.round(clamped * 1000) / 1000;
}

@Injectable()
export class SentimentService {
  private readonly logger = new Logger(SentimentService.name);

  constructor(
    @InjectRepository(Sentiment) private readonly sentimentRepository: Repository<Sentiment>,
    @InjectRepository(Asset) private readonly assetRepository: Repository<Asset>,
    @InjectRepository(News) private readonly newsRepository: Repository<News>,
    private readonly aiService: AiService,
    @Optional() @Inject(RANDOM_SOURCE) private readonly random: RandomSource = Math.random,
  ) {}

  /**
   * One new sentiment row per crypto asset. Headlines are scored by the AI
   * client when it is configured; otherwise the score is a random draw.
   */
  async generateForCrypto(manager?: EntityManager, now: Date = new Date()): Promise<number> {
    const sentiments = manager ? manager.getRepository(Sentiment) : this.sentimentRepository;
    const cryptoAssets = await this.assetRepository.find({
      where: { assetType: AssetType.CRYPTO },
      order: { ticker: 'ASC' },
    });

    if (!cryptoAssets.length) {
      this.logger.warn('No crypto assets found for sentiment generation');
      return 0;
    }

    let created = 0;
    for (const asset of cryptoAssets) {
      try {
        const { score, sourceType } = await this.scoreAsset(asset);
        await sentiments.save(
          sentiments.create({
            assetId: asset.id,
            sentimentScore: normalizeScore(score),
            sourceType,
            analysisDate: now,
          }),
        );
        created++;
        this.logger.debug(`Generated sentiment for ${asset.ticker}: ${normalizeScore(score)}`);
      } catch (error) {
        this.logger.warn(`Failed to generate sentiment for ${asset.ticker}: ${errorMessage(error)}`);
      }
    }

    this.logger.log(`Generated sentiments for ${created} crypto assets`);
    return created;
  }

  /** Newest analysis first, crypto assets by default. */
  getSentimentFeed(limit = 10, assetType: AssetType = AssetType.CRYPTO): Promise<Sentiment[]> {
    return this.sentimentRepository.find({
      where: { asset: { assetType } },
      relations: { asset: true },
      order: { analysisDate: 'DESC' },
      take: limit,
    });
  }

  private async scoreAsset(asset: Asset): Promise<{ score: number; sourceType: string }> {
    if (this.aiService.isAvailable()) {
      const headlines = await this.newsRepository.find({
        where: { assetId: asset.id },
        order: { publishedAt: 'DESC' },
        take: HEADLINES_PER_ASSET,
      });
      if (headlines.length) {
        const score = await this.aiService.scoreSentiment(
          asset.ticker,
          headlines.map((news) => news.title),
        );
        if (score !== null) return { score, sourceType: 'News' };
      }
    }

    const index = Math.min(
      SENTIMENT_SOURCE_TYPES.length - 1,
      Math.floor(this.random() * SENTIMENT_SOURCE_TYPES.length),
    );
    return { score: this.random(), sourceType: SENTIMENT_SOURCE_TYPES[index] };
  }
}
