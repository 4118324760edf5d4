import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { EnvConfig } from '../../config/env.validation';
import { Asset, AssetType } from '../../entities/asset.entity';
import { News } from '../../entities/news.entity';
import { errorMessage } from '../../utils/errors';
import { parsePublishedAt } from './helpers/published-at';
import { NewsDataArticle, NewsDataClient } from './newsdata.client';

const TITLE_LENGTH = 200;
const CONTENT_LENGTH = 5000;
const SOURCE_LENGTH = 500;
const LINK_KEYWORDS = 3;
const CRYPTO_FEED_MAX_AGE_MS = 6 * 60 * 60 * 1000;
const CRYPTO_BATCH = 20;

const CRYPTO_KEYWORDS = [
  'bitcoin',
  'btc',
  'ethereum',
  'eth',
  'crypto',
  'cryptocurrency',
  'blockchain',
  'defi',
  'nft',
  'altcoin',
  'binance',
  'coinbase',
];

export interface IngestOptions {
  /** Link only to crypto assets, falling back to the first one. */
  cryptoOnly?: boolean;
  manager?: EntityManager;
  now?: Date;
}

export interface FeedOptions {
  assetType?: AssetType;
  limit?: number;
}

export function mentionsCrypto(item: NewsDataArticle): boolean {
  const text = [
    item.title ?? '',
    item.description ?? item.content ?? '',
    ...(item.keywords ?? []),
  ]
    .join(' ')
    .toLowerCase();
  return CRYPTO_KEYWORDS.some((keyword) => text.includes(keyword));
}

@Injectable()
export class NewsService {
  private readonly logger = new Logger(NewsService.name);

  constructor(
    @InjectRepository(News) private readonly newsRepository: Repository<News>,
    @InjectRepository(Asset) private readonly assetRepository: Repository<Asset>,
    private readonly newsDataClient: NewsDataClient,
    private readonly configService: ConfigService<EnvConfig, true>,
  ) {}

  /**
   * Stores feed items not seen before (by title and source). Returns the
   * number of rows created.
   */
  async ingestArticles(items: NewsDataArticle[], options: IngestOptions = {}): Promise<number> {
    const newsRepository = options.manager ? options.manager.getRepository(News) : this.newsRepository;
    const assetRepository = options.manager ? options.manager.getRepository(Asset) : this.assetRepository;
    const now = options.now ?? new Date();

    const assets = await assetRepository.find({
      where: options.cryptoOnly ? { assetType: AssetType.CRYPTO } : {},
      order: { ticker: 'ASC' },
    });
    const byTicker = new Map(assets.map((asset) => [asset.ticker.toUpperCase(), asset]));

    let created = 0;
    for (const item of items) {
      const title = (item.title ?? '').trim().slice(0, TITLE_LENGTH);
      const source = (item.link ?? '').trim();
      if (!title || !source) continue;
      if (source.length > SOURCE_LENGTH) {
        this.logger.debug(`Skipping news item with an oversized link: ${title.slice(0, 50)}`);
        continue;
      }

      try {
        const exists = await newsRepository.countBy({ title, source });
        if (exists > 0) continue;

        const asset = this.linkAsset(item, byTicker, options.cryptoOnly ? assets : []);
        await newsRepository.save(
          newsRepository.create({
            title,
            source,
            content: (item.content || item.description || '').slice(0, CONTENT_LENGTH),
            publishedAt: parsePublishedAt(item.pubDate, now),
            assetId: asset?.id ?? null,
          }),
        );
        created++;
      } catch (error) {
        this.logger.debug(`Failed to save news item: ${errorMessage(error)}`);
      }
    }

    return created;
  }

  /** Newest first. */
  getFeed({ assetType, limit = 10 }: FeedOptions = {}): Promise<News[]> {
    return this.newsRepository.find({
      where: assetType ? { asset: { assetType } } : {},
      relations: { asset: true },
      order: { publishedAt: 'DESC' },
      take: limit,
    });
  }

  /**
   * Pulls the configured business news category into the store.
   */
  async refreshBusinessNews(manager?: EntityManager): Promise<number> {
    const items = await this.newsDataClient.fetchNews({
      category: this.configService.get('NEWS_CATEGORY', { infer: true }),
      language: this.configService.get('NEWS_LANGUAGE', { infer: true }),
      limit: this.configService.get('NEWS_FETCH_LIMIT', { infer: true }),
    });
    const created = await this.ingestArticles(items, { manager });
    this.logger.log(`Added ${created} new news articles`);
    return created;
  }

  /**
   * Crypto news feed, refetched from the provider when the newest stored
   * item is older than six hours.
   */
  async refreshCryptoFeed(limit = 10, now: Date = new Date()): Promise<News[]> {
    const [newest] = await this.getFeed({ assetType: AssetType.CRYPTO, limit: 1 });

    if (!newest || newest.publishedAt.getTime() < now.getTime() - CRYPTO_FEED_MAX_AGE_MS) {
      this.logger.log('Crypto news missing or stale, fetching from NewsData');
      const items = await this.newsDataClient.fetchNews({
        language: this.configService.get('NEWS_LANGUAGE', { infer: true }),
        limit: this.configService.get('NEWS_FETCH_LIMIT', { infer: true }),
      });
      const cryptoItems = items.filter(mentionsCrypto).slice(0, CRYPTO_BATCH);
      const created = await this.ingestArticles(cryptoItems, { cryptoOnly: true, now });
      this.logger.log(`Saved ${created} crypto news articles from ${cryptoItems.length} matches`);
    }

    return this.getFeed({ assetType: AssetType.CRYPTO, limit });
  }

  /**
   * First of the item's first three keywords naming a ticker. For the crypto
   * feed, a title naming the coin and then the first coin are tried next.
   */
  private linkAsset(
    item: NewsDataArticle,
    byTicker: Map<string, Asset>,
    fallbackPool: Asset[],
  ): Asset | null {
    for (const keyword of (item.keywords ?? []).slice(0, LINK_KEYWORDS)) {
      const asset = byTicker.get(keyword.trim().toUpperCase());
      if (asset) return asset;
    }

    if (!fallbackPool.length) return null;
    const title = (item.title ?? '').toLowerCase();
    return fallbackPool.find((asset) => title.includes(asset.name.toLowerCase())) ?? fallbackPool[0];
  }
}
