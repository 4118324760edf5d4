import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  EntityManager,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { ASSET_TYPE_LABELS, Asset, AssetType } from '../../entities/asset.entity';
import { AssetStats } from '../../entities/asset-stats.entity';
import { HistoricalPrice } from '../../entities/historical-price.entity';
import { News } from '../../entities/news.entity';
import { Sentiment } from '../../entities/sentiment.entity';
import { MarketDataService } from '../market-data/market-data.service';
import { Currency, LiveQuote, isSupportedCurrency } from '../market-data/market-data.types';
import { PredictionView, PredictionsService } from '../predictions/predictions.service';
import { CreateAssetDto } from './dto/create-asset.dto';
import { RecordPriceDto } from './dto/record-price.dto';
import { OhlcBar, ohlcViolation, startOfUtcDay } from './helpers/ohlc';
import { interpolateSeries, sparklineSvg } from './helpers/sparkline';

const DAY_MS = 24 * 60 * 60 * 1000;
const SPARKLINE_POINTS = 24;
const DETAIL_PRICE_ROWS = 30;
const DETAIL_FEED_ROWS = 10;

export interface AssetQuoteView {
  id: string;
  ticker: string;
  name: string;
  assetType: AssetType;
  assetTypeLabel: string;
  marketCap: number | null;
  price: number | null;
  change24h: number | null;
}

export interface CatalogEntry extends AssetQuoteView {
  sparkline: string;
}

export interface Catalog {
  currency: Currency;
  stocks: CatalogEntry[];
  cryptos: CatalogEntry[];
}

export interface AssetDetail extends AssetQuoteView {
  createdAt: Date;
  stats: AssetStats | null;
  predictions: PredictionView[];
  prices: HistoricalPrice[];
  news: News[];
  sentiments: Sentiment[];
}

export type SparklineSource = 'provider' | 'history' | 'interpolated' | 'flat' | 'none';

export interface Sparkline {
  ticker: string;
  currency: Currency;
  source: SparklineSource;
  points: number[];
  svg: string;
}

export interface DailyBar extends OhlcBar {
  date: Date;
  volume: number;
}

@Injectable()
export class AssetsService {
  private readonly logger = new Logger(AssetsService.name);

  constructor(
    @InjectRepository(Asset) private readonly assetRepository: Repository<Asset>,
    @InjectRepository(HistoricalPrice) private readonly priceRepository: Repository<HistoricalPrice>,
    @InjectRepository(AssetStats) private readonly statsRepository: Repository<AssetStats>,
    @InjectRepository(News) private readonly newsRepository: Repository<News>,
    @InjectRepository(Sentiment) private readonly sentimentRepository: Repository<Sentiment>,
    private readonly marketData: MarketDataService,
    private readonly predictionsService: PredictionsService,
  ) {}

  listAssets(assetType?: AssetType): Promise<Asset[]> {
    return this.assetRepository.find({
      where: assetType ? { assetType } : {},
      order: { ticker: 'ASC' },
    });
  }

  async findByTicker(ticker: string): Promise<Asset> {
    const asset = await this.assetRepository.findOne({ where: { ticker: ticker.trim().toUpperCase() } });
    if (!asset) {
      throw new NotFoundException(`Asset ${ticker} not found`);
    }
    return asset;
  }

  async createAsset(dto: CreateAssetDto): Promise<Asset> {
    const ticker = dto.ticker.trim().toUpperCase();
    if ((await this.assetRepository.countBy({ ticker })) > 0) {
      throw new ConflictException(`Asset ${ticker} already exists`);
    }

    const asset = await this.assetRepository.save(
      this.assetRepository.create({
        ticker,
        name: dto.name.trim(),
        assetType: dto.assetType,
        marketCap: dto.marketCap ?? null,
      }),
    );
    this.logger.log(`Created ${asset.assetType} asset ${asset.ticker}`);
    return asset;
  }

  /**
   * Removes the asset; prices, predictions, stats, news, sentiment,
   * favorites and viewed-prediction rows go with it.
   */
  async deleteAsset(ticker: string): Promise<void> {
    const asset = await this.findByTicker(ticker);
    await this.assetRepository.delete({ id: asset.id });
    this.logger.log(`Deleted asset ${asset.ticker}`);
  }

  async recordPrice(ticker: string, dto: RecordPriceDto): Promise<{ price: HistoricalPrice; created: boolean }> {
    const asset = await this.findByTicker(ticker);
    return this.upsertBar(asset, { ...dto, date: new Date(dto.date) });
  }

  /**
   * Inserts or replaces the asset's bar for the bar's UTC day.
   */
  async upsertBar(
    asset: Asset,
    bar: DailyBar,
    manager?: EntityManager,
  ): Promise<{ price: HistoricalPrice; created: boolean }> {
    const violation = ohlcViolation(bar);
    if (violation) {
      throw new BadRequestException(`Invalid OHLC bar for ${asset.ticker}: ${violation}`);
    }

    const prices = manager ? manager.getRepository(HistoricalPrice) : this.priceRepository;
    const date = startOfUtcDay(bar.date);
    const values = {
      openPrice: bar.openPrice,
      highPrice: bar.highPrice,
      lowPrice: bar.lowPrice,
      closePrice: bar.closePrice,
      volume: Math.round(bar.volume),
    };

    const existing = await prices.findOne({ where: { assetId: asset.id, date } });
    if (existing) {
      return { price: await prices.save(prices.merge(existing, values)), created: false };
    }
    return {
      price: await prices.save(prices.create({ assetId: asset.id, date, ...values })),
      created: true,
    };
  }

  /** Ascending by date; bounds are inclusive. */
  async getPriceHistory(ticker: string, from?: Date, to?: Date): Promise<HistoricalPrice[]> {
    const asset = await this.findByTicker(ticker);

    const where: FindOptionsWhere<HistoricalPrice> = { assetId: asset.id };
    if (from && to) where.date = Between(from, to);
    else if (from) where.date = MoreThanOrEqual(from);
    else if (to) where.date = LessThanOrEqual(to);

    return this.priceRepository.find({ where, order: { date: 'ASC' } });
  }

  async getCatalog(currency: string = 'USD'): Promise<Catalog> {
    const code = this.parseCurrency(currency);
    const assets = await this.listAssets();
    const quotes = await this.marketData.getQuotes(assets, code);

    const entries: CatalogEntry[] = [];
    for (const asset of assets) {
      const quote = quotes.get(asset.ticker.toUpperCase());
      const sparkline = await this.buildSparkline(asset, quote, code);
      entries.push({ ...this.toQuoteView(asset, quote), sparkline: sparkline.svg });
    }

    return {
      currency: code,
      stocks: entries.filter((entry) => entry.assetType === AssetType.STOCK),
      cryptos: entries.filter((entry) => entry.assetType === AssetType.CRYPTO),
    };
  }

  async getAssetDetail(ticker: string): Promise<AssetDetail> {
    const asset = await this.findByTicker(ticker);

    const [quotes, stats, predictions, recentPrices, news, sentiments] = await Promise.all([
      this.marketData.getQuotes([asset]),
      this.statsRepository.findOne({ where: { assetId: asset.id } }),
      this.predictionsService.latestByHorizon(asset.id),
      this.priceRepository.find({
        where: { assetId: asset.id },
        order: { date: 'DESC' },
        take: DETAIL_PRICE_ROWS,
      }),
      this.newsRepository.find({
        where: { assetId: asset.id },
        order: { publishedAt: 'DESC' },
        take: DETAIL_FEED_ROWS,
      }),
      this.sentimentRepository.find({
        where: { assetId: asset.id },
        order: { analysisDate: 'DESC' },
        take: DETAIL_FEED_ROWS,
      }),
    ]);

    return {
      ...this.toQuoteView(asset, quotes.get(asset.ticker)),
      createdAt: asset.createdAt,
      stats,
      predictions,
      prices: recentPrices.reverse(),
      news,
      sentiments,
    };
  }

  async getSparkline(ticker: string, currency: string = 'USD'): Promise<Sparkline> {
    const code = this.parseCurrency(currency);
    const asset = await this.findByTicker(ticker);
    const quotes = await this.marketData.getQuotes([asset], code);
    return this.buildSparkline(asset, quotes.get(asset.ticker), code);
  }

  /** Assets with their live price and 24h change, in the given order. */
  async quoteViews(assets: Asset[], currency: Currency = 'USD'): Promise<AssetQuoteView[]> {
    const quotes = await this.marketData.getQuotes(assets, currency);
    return assets.map((asset) => this.toQuoteView(asset, quotes.get(asset.ticker.toUpperCase())));
  }

  /**
   * Provider 24h series, then stored closes of the last 24 hours (USD
   * only), then a line from the previous close to the current price, then
   * a flat line at the current price.
   */
  async buildSparkline(
    asset: Asset,
    quote: LiveQuote | undefined,
    currency: Currency,
    now: Date = new Date(),
  ): Promise<Sparkline> {
    const series = (source: SparklineSource, points: number[]): Sparkline => ({
      ticker: asset.ticker,
      currency,
      source,
      points,
      svg: sparklineSvg(points),
    });

    const providerSeries = await this.marketData.get24hSeries(asset, currency);
    if (providerSeries.length >= 2) return series('provider', providerSeries);

    if (currency === 'USD') {
      const stored = await this.priceRepository.find({
        where: { assetId: asset.id, date: MoreThanOrEqual(new Date(now.getTime() - DAY_MS)) },
        order: { date: 'ASC' },
      });
      if (stored.length >= 2) return series('history', stored.map((row) => row.closePrice));
    }

    if (!quote) return series('none', []);

    const previous = previousClose(quote);
    if (previous !== null) {
      return series('interpolated', interpolateSeries(previous, quote.price, SPARKLINE_POINTS));
    }
    return series('flat', Array.from({ length: SPARKLINE_POINTS }, () => quote.price));
  }

  private toQuoteView(asset: Asset, quote: LiveQuote | undefined): AssetQuoteView {
    return {
      id: asset.id,
      ticker: asset.ticker,
      name: asset.name,
      assetType: asset.assetType,
      assetTypeLabel: ASSET_TYPE_LABELS[asset.assetType],
      marketCap: quote?.marketCap ?? asset.marketCap,
      price: quote?.price ?? null,
      change24h: quote?.change24h ?? null,
    };
  }

  private parseCurrency(currency: string): Currency {
    const code = currency.trim().toUpperCase();
    if (!isSupportedCurrency(code)) {
      throw new BadRequestException(`Unsupported currency ${currency}; use USD, EUR or RUB`);
    }
    return code;
  }
}

/**
 * Previous close from the quote, or backed out of the 24h change.
 */
function previousClose(quote: LiveQuote): number | null {
  if (quote.prevClose !== null && quote.prevClose > 0) return quote.prevClose;
  if (quote.change24h !== null && quote.change24h > -100) {
    return quote.price / (1 + quote.change24h / 100);
  }
  return null;
}
