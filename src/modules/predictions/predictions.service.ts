import {
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { Asset, AssetType } from '../../entities/asset.entity';
import { HistoricalPrice } from '../../entities/historical-price.entity';
import {
  HORIZON_DAYS,
  PREDICTION_HORIZONS,
  PredictionHorizon,
  PricePrediction,
} from '../../entities/price-prediction.entity';
import { UserPredictionHistory } from '../../entities/user-prediction-history.entity';
import { SubscriptionPlan, UserProfile } from '../../entities/user-profile.entity';
import { User } from '../../entities/user.entity';
import { AiService } from '../ai/ai.service';
import { MarketDataService } from '../market-data/market-data.service';
import { PriceDirection, predictionDirection } from './helpers/direction';
import { PRICE_PREDICTOR, PredictionOutput, PricePredictor } from './predictors/price-predictor';

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_PRICE = 100;
const HISTORY_WINDOW = 60;

export interface PredictionView {
  id: string;
  ticker: string;
  assetName: string;
  assetType: AssetType;
  horizon: PredictionHorizon;
  predictedPrice: number;
  confidence: number;
  modelVersion: string;
  predictionDate: Date;
  runDate: string;
  commentary: string | null;
  currentPrice: number | null;
  direction: PriceDirection;
}

export interface GenerationResult {
  created: number;
  updated: number;
}

export interface GenerateOptions {
  /** Live price; falls back to the latest positive stored close, then 100. */
  currentPrice?: number | null;
  /** Bar the caller writes in the same run, counted as stored history. */
  pendingBar?: Pick<HistoricalPrice, 'date' | 'closePrice'>;
  now?: Date;
}

export interface PredictionPlan {
  asset: Asset;
  runDate: string;
  now: Date;
  currentPrice: number;
  outputs: Array<PredictionOutput & { horizon: PredictionHorizon }>;
  commentary: string | null;
}

/** UTC calendar day, the idempotency unit of prediction runs. */
export function runDateOf(date: Date): string {
  return date.toISOString().slice(0, 10);
}

@Injectable()
export class PredictionsService {
  private readonly logger = new Logger(PredictionsService.name);

  constructor(
    @InjectRepository(PricePrediction)
    private readonly predictionRepository: Repository<PricePrediction>,
    @InjectRepository(HistoricalPrice)
    private readonly priceRepository: Repository<HistoricalPrice>,
    @InjectRepository(UserPredictionHistory)
    private readonly historyRepository: Repository<UserPredictionHistory>,
    @InjectRepository(UserProfile)
    private readonly profileRepository: Repository<UserProfile>,
    @Inject(PRICE_PREDICTOR) private readonly predictor: PricePredictor,
    private readonly marketData: MarketDataService,
    private readonly aiService: AiService,
  ) {}

  /**
   * Writes one prediction per horizon for the current UTC day. A second run
   * on the same day overwrites that day's rows.
   */
  async generateForAsset(
    asset: Asset,
    options: GenerateOptions & { manager?: EntityManager } = {},
  ): Promise<GenerationResult> {
    const plan = await this.planForAsset(asset, options);
    return this.savePlan(plan, options.manager);
  }

  /**
   * Runs the predictor and asks for commentary without writing anything.
   */
  async planForAsset(asset: Asset, options: GenerateOptions = {}): Promise<PredictionPlan> {
    const now = options.now ?? new Date();
    const recent = await this.priceRepository.find({
      where: { assetId: asset.id },
      order: { date: 'DESC' },
      take: HISTORY_WINDOW,
    });
    const history = recent.reverse().map((row) => ({ day: runDateOf(row.date), close: row.closePrice }));

    if (options.pendingBar) {
      const day = runDateOf(options.pendingBar.date);
      const pending = { day, close: options.pendingBar.closePrice };
      const index = history.findIndex((entry) => entry.day === day);
      if (index >= 0) history[index] = pending;
      else history.push(pending);
      history.sort((a, b) => a.day.localeCompare(b.day));
    }

    const closes = history.slice(-HISTORY_WINDOW).map((entry) => entry.close);
    const lastPositiveClose = [...closes].reverse().find((close) => close > 0);
    const currentPrice =
      options.currentPrice && options.currentPrice > 0
        ? options.currentPrice
        : lastPositiveClose ?? DEFAULT_PRICE;

    const outputs = PREDICTION_HORIZONS.map((horizon) => ({
      horizon,
      ...this.predictor.predict({ asset, horizon, currentPrice, closes }),
    }));
    const commentary = await this.aiService.predictionCommentary(asset.ticker, currentPrice, outputs);

    return { asset, runDate: runDateOf(now), now, currentPrice, outputs, commentary };
  }

  /** Upserts the plan's rows on (asset, horizon, run day). */
  async savePlan(plan: PredictionPlan, manager?: EntityManager): Promise<GenerationResult> {
    const predictions = manager ? manager.getRepository(PricePrediction) : this.predictionRepository;
    const { asset, runDate, now } = plan;

    const result: GenerationResult = { created: 0, updated: 0 };
    for (const output of plan.outputs) {
      const values = {
        predictionDate: new Date(now.getTime() + HORIZON_DAYS[output.horizon] * DAY_MS),
        predictedPrice: output.predictedPrice,
        confidence: output.confidence,
        modelVersion: output.modelVersion,
        commentary: output.horizon === PredictionHorizon.ONE_DAY ? plan.commentary : null,
      };

      const existing = await predictions.findOne({
        where: { assetId: asset.id, horizon: output.horizon, runDate },
      });
      if (existing) {
        await predictions.save(predictions.merge(existing, values));
        result.updated++;
      } else {
        await predictions.save(
          predictions.create({ assetId: asset.id, horizon: output.horizon, runDate, ...values }),
        );
        result.created++;
      }
    }

    this.logger.debug(
      `Predictions for ${asset.ticker} at ${plan.currentPrice}: ${result.created} created, ${result.updated} updated`,
    );
    return result;
  }

  async listLatest(limit = 10, assetIds?: string[]): Promise<PredictionView[]> {
    if (assetIds && !assetIds.length) return [];

    const rows = await this.predictionRepository.find({
      where: assetIds ? { assetId: In(assetIds) } : {},
      relations: { asset: true },
      order: { createdAt: 'DESC', horizon: 'ASC' },
      take: limit,
    });
    return this.describe(rows);
  }

  /** Newest prediction of each horizon for one asset. */
  async latestByHorizon(assetId: string): Promise<PredictionView[]> {
    const rows: PricePrediction[] = [];
    for (const horizon of PREDICTION_HORIZONS) {
      const row = await this.predictionRepository.findOne({
        where: { assetId, horizon },
        relations: { asset: true },
        order: { runDate: 'DESC', createdAt: 'DESC' },
      });
      if (row) rows.push(row);
    }
    return this.describe(rows);
  }

  /**
   * Free plans see 1D predictions only. Every successful view is logged.
   */
  async viewPrediction(user: User, predictionId: string): Promise<PredictionView> {
    const prediction = await this.predictionRepository.findOne({
      where: { id: predictionId },
      relations: { asset: true },
    });
    if (!prediction) {
      throw new NotFoundException(`Prediction ${predictionId} not found`);
    }

    const profile = await this.profileRepository.findOne({ where: { userId: user.id } });
    const plan = profile?.subscriptionPlan ?? SubscriptionPlan.FREE;
    if (plan === SubscriptionPlan.FREE && prediction.horizon !== PredictionHorizon.ONE_DAY) {
      throw new ForbiddenException(`${prediction.horizon} predictions require a premium plan`);
    }

    await this.historyRepository.save(
      this.historyRepository.create({ userId: user.id, predictionId: prediction.id }),
    );

    const [view] = await this.describe([prediction]);
    return view;
  }

  /**
   * Current price per asset id: live quote first, latest stored close second.
   */
  async currentPrices(assets: Asset[]): Promise<Map<string, number>> {
    const quotes = await this.marketData.getQuotes(assets);
    const prices = new Map<string, number>();

    for (const asset of assets) {
      const quote = quotes.get(asset.ticker.toUpperCase());
      if (quote) {
        prices.set(asset.id, quote.price);
        continue;
      }
      const latest = await this.priceRepository.findOne({
        where: { assetId: asset.id },
        order: { date: 'DESC' },
      });
      if (latest) prices.set(asset.id, latest.closePrice);
    }
    return prices;
  }

  async describe(predictions: PricePrediction[]): Promise<PredictionView[]> {
    const assets = new Map<string, Asset>();
    for (const prediction of predictions) {
      if (prediction.asset) assets.set(prediction.asset.id, prediction.asset);
    }
    const prices = await this.currentPrices([...assets.values()]);

    return predictions.flatMap((prediction) => {
      const asset = prediction.asset;
      if (!asset) return [];
      const currentPrice = prices.get(asset.id) ?? null;
      return [
        {
          id: prediction.id,
          ticker: asset.ticker,
          assetName: asset.name,
          assetType: asset.assetType,
          horizon: prediction.horizon,
          predictedPrice: prediction.predictedPrice,
          confidence: prediction.confidence,
          modelVersion: prediction.modelVersion,
          predictionDate: prediction.predictionDate,
          runDate: prediction.runDate,
          commentary: prediction.commentary,
          currentPrice,
          direction: predictionDirection(prediction.predictedPrice, currentPrice),
        },
      ];
    });
  }
}
