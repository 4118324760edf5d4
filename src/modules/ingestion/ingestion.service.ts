import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { LockService } from '../../common/services/lock.service';
import { EnvConfig } from '../../config/env.validation';
import { Asset } from '../../entities/asset.entity';
import { withRetry } from '../../utils/database.utils';
import { errorMessage } from '../../utils/errors';
import { AssetsService } from '../assets/assets.service';
import { AuthService } from '../auth/auth.service';
import { MarketDataService } from '../market-data/market-data.service';
import { NewsService } from '../news/news.service';
import { PredictionsService } from '../predictions/predictions.service';
import { SentimentService } from '../sentiment/sentiment.service';
import { StatsService } from '../stats/stats.service';
import { dailyBarFromQuote } from './helpers/daily-bar';

export const INGESTION_LOCK = 'ingestion';

export interface IngestionFailure {
  ticker: string;
  error: string;
}

export interface IngestionReport {
  startedAt: Date;
  finishedAt: Date;
  newsCreated: number;
  pricesRecorded: number;
  predictionsCreated: number;
  predictionsUpdated: number;
  statsUpdated: number;
  sentimentsCreated: number;
  sessionsPurged: number;
  /** Assets without a usable live quote; they predict from stored closes. */
  skipped: string[];
  failures: IngestionFailure[];
}

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    @InjectRepository(Asset) private readonly assetRepository: Repository<Asset>,
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly configService: ConfigService<EnvConfig, true>,
    private readonly lockService: LockService,
    private readonly marketData: MarketDataService,
    private readonly assetsService: AssetsService,
    private readonly predictionsService: PredictionsService,
    private readonly statsService: StatsService,
    private readonly newsService: NewsService,
    private readonly sentimentService: SentimentService,
    private readonly authService: AuthService,
  ) {}

  @Cron(CronExpression.EVERY_HOUR, { name: 'ingestion' })
  async handleCron(): Promise<void> {
    if (!this.configService.get('INGESTION_ENABLED', { infer: true })) {
      this.logger.debug('Ingestion disabled; skipping scheduled run');
      return;
    }
    try {
      await this.run();
    } catch (error) {
      this.logger.error(`Scheduled ingestion failed: ${errorMessage(error)}`);
    }
  }

  /**
   * One full ingestion pass. Returns null without doing anything when a
   * run is already in progress.
   */
  async run(now: Date = new Date()): Promise<IngestionReport | null> {
    const report = await this.lockService.runExclusive(INGESTION_LOCK, () => this.execute(now));
    if (!report) this.logger.warn('Ingestion already running; trigger ignored');
    return report;
  }

  private async execute(now: Date): Promise<IngestionReport> {
    const report: IngestionReport = {
      startedAt: new Date(),
      finishedAt: new Date(),
      newsCreated: 0,
      pricesRecorded: 0,
      predictionsCreated: 0,
      predictionsUpdated: 0,
      statsUpdated: 0,
      sentimentsCreated: 0,
      sessionsPurged: 0,
      skipped: [],
      failures: [],
    };
    this.logger.log('Ingestion run started');

    try {
      report.newsCreated = await this.newsService.refreshBusinessNews();
    } catch (error) {
      this.logger.error(`News refresh failed: ${errorMessage(error)}`);
    }

    const assets = await this.assetRepository.find({ order: { ticker: 'ASC' } });
    const quotes = await this.marketData.getQuotes(assets);

    for (const asset of assets) {
      const found = quotes.get(asset.ticker.toUpperCase());
      const quote = found && found.price > 0 ? found : undefined;
      if (!quote) report.skipped.push(asset.ticker);

      try {
        // Provider and model calls stay outside the transaction.
        const bar = quote ? dailyBarFromQuote(asset.assetType, quote, now) : null;
        const plan = await this.predictionsService.planForAsset(asset, {
          currentPrice: quote?.price ?? null,
          pendingBar: bar ?? undefined,
          now,
        });

        const result = await withRetry(
          () =>
            this.dataSource.transaction(async (manager) => {
              if (bar) {
                await this.assetsService.upsertBar(asset, bar, manager);
                if (quote && quote.marketCap !== null) {
                  await manager.getRepository(Asset).update({ id: asset.id }, { marketCap: quote.marketCap });
                }
              }
              const predictions = await this.predictionsService.savePlan(plan, manager);
              await this.statsService.recompute(asset, manager);
              return { priceRecorded: bar !== null, predictions };
            }),
          { operationName: `Ingestion for ${asset.ticker}` },
        );

        if (result.priceRecorded) report.pricesRecorded++;
        report.predictionsCreated += result.predictions.created;
        report.predictionsUpdated += result.predictions.updated;
        report.statsUpdated++;
      } catch (error) {
        this.logger.error(`Ingestion failed for ${asset.ticker}: ${errorMessage(error)}`);
        report.failures.push({ ticker: asset.ticker, error: errorMessage(error) });
      }
    }

    try {
      report.sentimentsCreated = await this.sentimentService.generateForCrypto(undefined, now);
    } catch (error) {
      this.logger.error(`Sentiment generation failed: ${errorMessage(error)}`);
    }

    try {
      report.sessionsPurged = await this.authService.purgeExpiredSessions();
    } catch (error) {
      this.logger.error(`Session cleanup failed: ${errorMessage(error)}`);
    }

    report.finishedAt = new Date();
    this.logger.log(
      `Ingestion finished in ${report.finishedAt.getTime() - report.startedAt.getTime()}ms: ` +
        `${report.newsCreated} news, ${report.pricesRecorded} prices, ` +
        `${report.predictionsCreated} predictions created, ${report.predictionsUpdated} updated, ` +
        `${report.statsUpdated} stats, ${report.sentimentsCreated} sentiments, ` +
        `${report.skipped.length} without quotes, ${report.failures.length} failed`,
    );
    return report;
  }
}
