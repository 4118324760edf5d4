import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Asset, AssetType } from '../../entities/asset.entity';
import { HistoricalPrice } from '../../entities/historical-price.entity';
import {
  HORIZON_DAYS,
  PredictionHorizon,
  PricePrediction,
} from '../../entities/price-prediction.entity';
import { UserPredictionHistory } from '../../entities/user-prediction-history.entity';
import { SubscriptionPlan, UserProfile } from '../../entities/user-profile.entity';
import { User } from '../../entities/user.entity';
import { testDatabaseImports } from '../../testing/test-database';
import { AiService } from '../ai/ai.service';
import { MarketDataService } from '../market-data/market-data.service';
import { LiveQuote } from '../market-data/market-data.types';
import { PRICE_PREDICTOR, PredictionInput, PricePredictor } from './predictors/price-predictor';
import { PredictionsService, runDateOf } from './predictions.service';

function quote(price: number): LiveQuote {
  return {
    price,
    change24h: null,
    prevClose: null,
    open: null,
    high: null,
    low: null,
    volume24h: null,
    marketCap: null,
  };
}

describe('PredictionsService', () => {
  let moduleRef: TestingModule;
  let service: PredictionsService;
  let assets: Repository<Asset>;
  let prices: Repository<HistoricalPrice>;
  let predictions: Repository<PricePrediction>;
  let history: Repository<UserPredictionHistory>;
  let users: Repository<User>;
  let profiles: Repository<UserProfile>;
  let apple: Asset;

  // Adds the horizon's day count to the current price.
  const predict = jest.fn(({ currentPrice, horizon }: PredictionInput) => ({
    predictedPrice: currentPrice + HORIZON_DAYS[horizon],
    confidence: 0.5,
    modelVersion: 'test-v1',
  }));
  const predictor: PricePredictor = { modelVersion: 'test-v1', predict };
  const marketData = { getQuotes: jest.fn() };
  const aiService = { predictionCommentary: jest.fn() };

  const now = new Date('2026-03-10T12:00:00.000Z');

  beforeEach(async () => {
    predict.mockClear();
    marketData.getQuotes.mockResolvedValue(new Map());
    aiService.predictionCommentary.mockResolvedValue(null);

    moduleRef = await Test.createTestingModule({
      imports: [...testDatabaseImports()],
      providers: [
        PredictionsService,
        { provide: PRICE_PREDICTOR, useValue: predictor },
        { provide: MarketDataService, useValue: marketData },
        { provide: AiService, useValue: aiService },
      ],
    }).compile();

    service = moduleRef.get(PredictionsService);
    assets = moduleRef.get(getRepositoryToken(Asset));
    prices = moduleRef.get(getRepositoryToken(HistoricalPrice));
    predictions = moduleRef.get(getRepositoryToken(PricePrediction));
    history = moduleRef.get(getRepositoryToken(UserPredictionHistory));
    users = moduleRef.get(getRepositoryToken(User));
    profiles = moduleRef.get(getRepositoryToken(UserProfile));

    apple = await assets.save(
      assets.create({ ticker: 'AAPL', name: 'Apple Inc.', assetType: AssetType.STOCK, marketCap: null }),
    );
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  async function createUser(username: string, plan: SubscriptionPlan): Promise<User> {
    const user = await users.save(users.create({ username, passwordHash: 'scrypt$salt$key' }));
    await profiles.save(profiles.create({ userId: user.id, subscriptionPlan: plan }));
    return user;
  }

  async function recordClose(date: string, close: number) {
    await prices.save(
      prices.create({
        assetId: apple.id,
        date: new Date(date),
        openPrice: close,
        highPrice: close,
        lowPrice: close,
        closePrice: close,
        volume: 1000,
      }),
    );
  }

  describe('runDateOf', () => {
    it('uses the UTC calendar day', () => {
      expect(runDateOf(new Date('2026-03-10T23:59:59.000Z'))).toBe('2026-03-10');
      expect(runDateOf(new Date('2026-03-11T00:00:00.000Z'))).toBe('2026-03-11');
    });
  });

  describe('generateForAsset', () => {
    it('writes one row per horizon for the run day', async () => {
      await expect(service.generateForAsset(apple, { currentPrice: 200, now })).resolves.toEqual({
        created: 3,
        updated: 0,
      });

      const rows = await predictions.find({ order: { predictedPrice: 'ASC' } });
      expect(rows.map((row) => [row.horizon, row.predictedPrice, row.runDate])).toEqual([
        [PredictionHorizon.ONE_DAY, 201, '2026-03-10'],
        [PredictionHorizon.SEVEN_DAYS, 207, '2026-03-10'],
        [PredictionHorizon.THIRTY_DAYS, 230, '2026-03-10'],
      ]);
      expect(rows[0].predictionDate.toISOString()).toBe('2026-03-11T12:00:00.000Z');
      expect(rows[2].predictionDate.toISOString()).toBe('2026-04-09T12:00:00.000Z');
      expect(rows.every((row) => row.modelVersion === 'test-v1')).toBe(true);
    });

    it('updates instead of duplicating on a rerun the same day', async () => {
      await service.generateForAsset(apple, { currentPrice: 200, now });
      const later = new Date('2026-03-10T18:30:00.000Z');

      await expect(service.generateForAsset(apple, { currentPrice: 300, now: later })).resolves.toEqual({
        created: 0,
        updated: 3,
      });

      expect(await predictions.count()).toBe(3);
      const oneDay = await predictions.findOneByOrFail({ horizon: PredictionHorizon.ONE_DAY });
      expect(oneDay.predictedPrice).toBe(301);
    });

    it('starts a new set on the next UTC day', async () => {
      await service.generateForAsset(apple, { currentPrice: 200, now });
      await service.generateForAsset(apple, {
        currentPrice: 200,
        now: new Date('2026-03-11T00:05:00.000Z'),
      });

      expect(await predictions.count()).toBe(6);
    });

    it('falls back to the latest stored close and passes closes oldest first', async () => {
      await recordClose('2026-03-07T00:00:00.000Z', 150);
      await recordClose('2026-03-09T00:00:00.000Z', 160);
      await recordClose('2026-03-08T00:00:00.000Z', 155);

      await service.generateForAsset(apple, { now });

      expect(predict).toHaveBeenCalledWith(
        expect.objectContaining({ currentPrice: 160, closes: [150, 155, 160] }),
      );
    });

    it('skips zero closes when falling back from a zero quote', async () => {
      await recordClose('2026-03-08T00:00:00.000Z', 150);
      await recordClose('2026-03-09T00:00:00.000Z', 0);

      await service.generateForAsset(apple, { currentPrice: 0, now });

      expect(predict).toHaveBeenCalledWith(expect.objectContaining({ currentPrice: 150 }));
      const rows = await predictions.find();
      expect(rows.map((row) => row.predictedPrice).sort((a, b) => a - b)).toEqual([151, 157, 180]);
    });

    it('uses 100 when there is neither a quote nor history', async () => {
      await service.generateForAsset(apple, { currentPrice: null, now });

      expect(predict).toHaveBeenCalledWith(expect.objectContaining({ currentPrice: 100, closes: [] }));
    });

    it('stores commentary on the 1D row only', async () => {
      aiService.predictionCommentary.mockResolvedValue('Flat week ahead.');

      await service.generateForAsset(apple, { currentPrice: 200, now });

      const rows = await predictions.find();
      const byHorizon = new Map(rows.map((row) => [row.horizon, row.commentary]));
      expect(byHorizon.get(PredictionHorizon.ONE_DAY)).toBe('Flat week ahead.');
      expect(byHorizon.get(PredictionHorizon.SEVEN_DAYS)).toBeNull();
      expect(byHorizon.get(PredictionHorizon.THIRTY_DAYS)).toBeNull();
    });
  });

  describe('planForAsset', () => {
    it('replaces the stored close of the pending bar\'s day', async () => {
      await recordClose('2026-03-09T00:00:00.000Z', 150);
      await recordClose('2026-03-10T00:00:00.000Z', 155);

      const plan = await service.planForAsset(apple, {
        currentPrice: 170,
        pendingBar: { date: new Date('2026-03-10T00:00:00.000Z'), closePrice: 170 },
        now,
      });

      expect(predict).toHaveBeenCalledWith(expect.objectContaining({ currentPrice: 170, closes: [150, 170] }));
      expect(plan.runDate).toBe('2026-03-10');
      expect(plan.outputs.map((output) => output.predictedPrice)).toEqual([171, 177, 200]);
    });

    it('appends a pending bar for a new day without writing anything', async () => {
      await recordClose('2026-03-09T00:00:00.000Z', 150);

      await service.planForAsset(apple, {
        currentPrice: 160,
        pendingBar: { date: new Date('2026-03-10T00:00:00.000Z'), closePrice: 160 },
        now,
      });

      expect(predict).toHaveBeenCalledWith(expect.objectContaining({ closes: [150, 160] }));
      expect(await predictions.count()).toBe(0);
      expect(await prices.count()).toBe(1);
    });
  });

  describe('listLatest', () => {
    it('attaches the direction against the live quote', async () => {
      await service.generateForAsset(apple, { currentPrice: 200, now });
      marketData.getQuotes.mockResolvedValue(new Map([['AAPL', quote(200)]]));

      const views = await service.listLatest(10);

      const directions = new Map(views.map((view) => [view.horizon, view.direction]));
      // 201 is inside the 1% band around 200; 207 and 230 are above it.
      expect(directions.get(PredictionHorizon.ONE_DAY)).toBe('neutral');
      expect(directions.get(PredictionHorizon.SEVEN_DAYS)).toBe('up');
      expect(directions.get(PredictionHorizon.THIRTY_DAYS)).toBe('up');
      expect(views[0]).toMatchObject({ ticker: 'AAPL', assetName: 'Apple Inc.', currentPrice: 200 });
    });

    it('compares against the stored close when no quote is available', async () => {
      await service.generateForAsset(apple, { currentPrice: 200, now });
      await recordClose('2026-03-10T00:00:00.000Z', 250);

      const views = await service.listLatest(10);

      expect(views.every((view) => view.currentPrice === 250 && view.direction === 'down')).toBe(true);
    });

    it('returns nothing for an empty asset filter', async () => {
      await service.generateForAsset(apple, { currentPrice: 200, now });

      await expect(service.listLatest(10, [])).resolves.toEqual([]);
    });
  });

  describe('viewPrediction', () => {
    beforeEach(async () => {
      await service.generateForAsset(apple, { currentPrice: 200, now });
    });

    it('lets free users view 1D predictions and logs the view', async () => {
      const user = await createUser('free-user', SubscriptionPlan.FREE);
      const oneDay = await predictions.findOneByOrFail({ horizon: PredictionHorizon.ONE_DAY });

      const view = await service.viewPrediction(user, oneDay.id);

      expect(view.id).toBe(oneDay.id);
      expect(await history.countBy({ userId: user.id, predictionId: oneDay.id })).toBe(1);
    });

    it('forbids longer horizons on the free plan without logging', async () => {
      const user = await createUser('free-user', SubscriptionPlan.FREE);
      const weekly = await predictions.findOneByOrFail({ horizon: PredictionHorizon.SEVEN_DAYS });

      await expect(service.viewPrediction(user, weekly.id)).rejects.toBeInstanceOf(ForbiddenException);
      expect(await history.count()).toBe(0);
    });

    it('lets premium users view every horizon', async () => {
      const user = await createUser('premium-user', SubscriptionPlan.PREMIUM);
      const monthly = await predictions.findOneByOrFail({ horizon: PredictionHorizon.THIRTY_DAYS });

      await expect(service.viewPrediction(user, monthly.id)).resolves.toMatchObject({
        horizon: PredictionHorizon.THIRTY_DAYS,
        predictedPrice: 230,
      });
    });

    it('rejects an unknown prediction', async () => {
      const user = await createUser('premium-user', SubscriptionPlan.PREMIUM);

      await expect(
        service.viewPrediction(user, '00000000-0000-4000-8000-000000000000'),
      ).rejects.toBeInstanceOf(NotFoundException);
    });
  });
});
