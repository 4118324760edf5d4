import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Asset, AssetType } from '../../entities/asset.entity';
import { AssetStats } from '../../entities/asset-stats.entity';
import { HistoricalPrice } from '../../entities/historical-price.entity';
import { News } from '../../entities/news.entity';
import { PredictionHorizon, PricePrediction } from '../../entities/price-prediction.entity';
import { Sentiment } from '../../entities/sentiment.entity';
import { UserPredictionHistory } from '../../entities/user-prediction-history.entity';
import { UserProfile } from '../../entities/user-profile.entity';
import { User } from '../../entities/user.entity';
import { testDatabaseImports } from '../../testing/test-database';
import { MarketDataService } from '../market-data/market-data.service';
import { LiveQuote } from '../market-data/market-data.types';
import { PredictionsService } from '../predictions/predictions.service';
import { AssetsService } from './assets.service';

function quote(overrides: Partial<LiveQuote>): LiveQuote {
  return {
    price: 0,
    change24h: null,
    prevClose: null,
    open: null,
    high: null,
    low: null,
    volume24h: null,
    marketCap: null,
    ...overrides,
  };
}

describe('AssetsService', () => {
  let moduleRef: TestingModule;
  let service: AssetsService;
  let assets: Repository<Asset>;
  let prices: Repository<HistoricalPrice>;
  const marketData = { getQuotes: jest.fn(), get24hSeries: jest.fn() };
  const predictionsService = { latestByHorizon: jest.fn() };

  beforeEach(async () => {
    marketData.getQuotes.mockReset().mockResolvedValue(new Map());
    marketData.get24hSeries.mockReset().mockResolvedValue([]);
    predictionsService.latestByHorizon.mockReset().mockResolvedValue([]);

    moduleRef = await Test.createTestingModule({
      imports: [...testDatabaseImports()],
      providers: [
        AssetsService,
        { provide: MarketDataService, useValue: marketData },
        { provide: PredictionsService, useValue: predictionsService },
      ],
    }).compile();

    service = moduleRef.get(AssetsService);
    assets = moduleRef.get(getRepositoryToken(Asset));
    prices = moduleRef.get(getRepositoryToken(HistoricalPrice));
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  const bar = {
    date: new Date('2026-03-10T15:30:00.000Z'),
    openPrice: 100,
    highPrice: 105,
    lowPrice: 98,
    closePrice: 104,
    volume: 1200,
  };

  describe('createAsset', () => {
    it('stores the ticker upper-cased', async () => {
      const asset = await service.createAsset({ ticker: 'msft', name: 'Microsoft', assetType: AssetType.STOCK });

      expect(asset.ticker).toBe('MSFT');
      expect(asset.marketCap).toBeNull();
    });

    it('rejects a ticker that already exists in any case', async () => {
      await service.createAsset({ ticker: 'MSFT', name: 'Microsoft', assetType: AssetType.STOCK });

      await expect(
        service.createAsset({ ticker: 'msft', name: 'Microsoft again', assetType: AssetType.STOCK }),
      ).rejects.toBeInstanceOf(ConflictException);
    });
  });

  it('lists assets by ticker with an optional type filter', async () => {
    await service.createAsset({ ticker: 'TSLA', name: 'Tesla', assetType: AssetType.STOCK });
    await service.createAsset({ ticker: 'BTC', name: 'Bitcoin', assetType: AssetType.CRYPTO });
    await service.createAsset({ ticker: 'AAPL', name: 'Apple', assetType: AssetType.STOCK });

    expect((await service.listAssets()).map((a) => a.ticker)).toEqual(['AAPL', 'BTC', 'TSLA']);
    expect((await service.listAssets(AssetType.STOCK)).map((a) => a.ticker)).toEqual(['AAPL', 'TSLA']);
  });

  describe('upsertBar', () => {
    let apple: Asset;

    beforeEach(async () => {
      apple = await service.createAsset({ ticker: 'AAPL', name: 'Apple', assetType: AssetType.STOCK });
    });

    it('stores the bar on its UTC day', async () => {
      const { price, created } = await service.upsertBar(apple, bar);

      expect(created).toBe(true);
      expect(price.date.toISOString()).toBe('2026-03-10T00:00:00.000Z');
    });

    it('replaces the bar of the same day', async () => {
      await service.upsertBar(apple, bar);

      const { created } = await service.upsertBar(apple, {
        ...bar,
        date: new Date('2026-03-10T21:00:00.000Z'),
        closePrice: 101,
      });

      expect(created).toBe(false);
      const rows = await prices.find();
      expect(rows).toHaveLength(1);
      expect(rows[0].closePrice).toBe(101);
    });

    it.each([
      ['high below low', { highPrice: 97 }],
      ['high below close', { closePrice: 106 }],
      ['low above open', { lowPrice: 101 }],
    ])('rejects a bar with %s', async (_label, change) => {
      await expect(service.upsertBar(apple, { ...bar, ...change })).rejects.toBeInstanceOf(
        BadRequestException,
      );
      expect(await prices.count()).toBe(0);
    });

    it('records a price by ticker from the request body', async () => {
      const { price } = await service.recordPrice('aapl', { ...bar, date: '2026-03-11' });

      expect(price.assetId).toBe(apple.id);
      expect(price.date.toISOString()).toBe('2026-03-11T00:00:00.000Z');
    });
  });

  describe('getPriceHistory', () => {
    it('returns the inclusive range oldest first', async () => {
      const apple = await service.createAsset({ ticker: 'AAPL', name: 'Apple', assetType: AssetType.STOCK });
      for (const day of ['2026-03-03', '2026-03-01', '2026-03-02', '2026-03-04']) {
        await service.upsertBar(apple, { ...bar, date: new Date(`${day}T12:00:00.000Z`) });
      }

      const rows = await service.getPriceHistory(
        'AAPL',
        new Date('2026-03-02T00:00:00.000Z'),
        new Date('2026-03-03T00:00:00.000Z'),
      );

      expect(rows.map((row) => row.date.toISOString().slice(0, 10))).toEqual(['2026-03-02', '2026-03-03']);
      expect(await service.getPriceHistory('AAPL')).toHaveLength(4);
    });

    it('rejects an unknown ticker', async () => {
      await expect(service.getPriceHistory('NOPE')).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  it('deletes everything recorded for an asset', async () => {
    const apple = await service.createAsset({ ticker: 'AAPL', name: 'Apple', assetType: AssetType.STOCK });
    await service.upsertBar(apple, bar);

    const predictions = moduleRef.get<Repository<PricePrediction>>(getRepositoryToken(PricePrediction));
    const stats = moduleRef.get<Repository<AssetStats>>(getRepositoryToken(AssetStats));
    const news = moduleRef.get<Repository<News>>(getRepositoryToken(News));
    const sentiments = moduleRef.get<Repository<Sentiment>>(getRepositoryToken(Sentiment));
    const users = moduleRef.get<Repository<User>>(getRepositoryToken(User));
    const profiles = moduleRef.get<Repository<UserProfile>>(getRepositoryToken(UserProfile));
    const history = moduleRef.get<Repository<UserPredictionHistory>>(getRepositoryToken(UserPredictionHistory));

    const prediction = await predictions.save(
      predictions.create({
        assetId: apple.id,
        horizon: PredictionHorizon.ONE_DAY,
        predictionDate: new Date('2026-03-11T00:00:00.000Z'),
        runDate: '2026-03-10',
        predictedPrice: 105,
        confidence: 0.7,
        modelVersion: 'v1.0-random',
        commentary: null,
      }),
    );
    await stats.save(stats.create({ assetId: apple.id, volatility: 1, rsi: 50, movingAverage50: null, movingAverage200: null }));
    await news.save(news.create({ assetId: apple.id, title: 'Apple', content: '', source: 'https://news.test/a', publishedAt: new Date() }));
    await sentiments.save(sentiments.create({ assetId: apple.id, sentimentScore: 0.5, sourceType: 'News', analysisDate: new Date() }));
    const user = await users.save(users.create({ username: 'alice', passwordHash: 'scrypt$salt$key' }));
    const profile = await profiles.save(profiles.create({ userId: user.id, favoriteAssets: [apple] }));
    await history.save(history.create({ userId: user.id, predictionId: prediction.id }));

    await service.deleteAsset('aapl');

    expect(await assets.count()).toBe(0);
    expect(await prices.count()).toBe(0);
    expect(await predictions.count()).toBe(0);
    expect(await stats.count()).toBe(0);
    expect(await news.count()).toBe(0);
    expect(await sentiments.count()).toBe(0);
    expect(await history.count()).toBe(0);
    const reloaded = await profiles.findOneOrFail({ where: { id: profile.id }, relations: { favoriteAssets: true } });
    expect(reloaded.favoriteAssets).toEqual([]);
  });

  it('deletes an asset that users have favorited', async () => {
    const apple = await service.createAsset({ ticker: 'AAPL', name: 'Apple', assetType: AssetType.STOCK });
    const microsoft = await service.createAsset({ ticker: 'MSFT', name: 'Microsoft', assetType: AssetType.STOCK });
    const users = moduleRef.get<Repository<User>>(getRepositoryToken(User));
    const profiles = moduleRef.get<Repository<UserProfile>>(getRepositoryToken(UserProfile));
    const user = await users.save(users.create({ username: 'carol', passwordHash: 'scrypt$salt$key' }));
    const profile = await profiles.save(profiles.create({ userId: user.id, favoriteAssets: [apple, microsoft] }));

    await service.deleteAsset('AAPL');

    const reloaded = await profiles.findOneOrFail({ where: { id: profile.id }, relations: { favoriteAssets: true } });
    expect((reloaded.favoriteAssets ?? []).map((asset) => asset.ticker)).toEqual(['MSFT']);
    expect(await assets.countBy({ ticker: 'AAPL' })).toBe(0);
  });

  describe('getCatalog', () => {
    beforeEach(async () => {
      await service.createAsset({ ticker: 'AAPL', name: 'Apple', assetType: AssetType.STOCK });
      await service.createAsset({ ticker: 'BTC', name: 'Bitcoin', assetType: AssetType.CRYPTO });
    });

    it('splits stocks from cryptos and attaches quotes and sparklines', async () => {
      marketData.getQuotes.mockResolvedValue(
        new Map([
          ['AAPL', quote({ price: 110, prevClose: 100, change24h: 10 })],
          ['BTC', quote({ price: 50000, change24h: 25, marketCap: 900000 })],
        ]),
      );

      const catalog = await service.getCatalog('eur');

      expect(catalog.currency).toBe('EUR');
      expect(marketData.getQuotes).toHaveBeenCalledWith(expect.any(Array), 'EUR');
      expect(catalog.stocks.map((entry) => [entry.ticker, entry.price, entry.change24h])).toEqual([
        ['AAPL', 110, 10],
      ]);
      expect(catalog.cryptos[0]).toMatchObject({
        ticker: 'BTC',
        assetTypeLabel: 'Cryptocurrency',
        price: 50000,
        marketCap: 900000,
      });
      expect(catalog.cryptos[0].sparkline).toContain('stroke="#1ca01c"');
    });

    it('rejects an unsupported currency', async () => {
      await expect(service.getCatalog('GBP')).rejects.toBeInstanceOf(BadRequestException);
    });
  });

  describe('buildSparkline', () => {
    let bitcoin: Asset;
    const now = new Date('2026-03-10T12:00:00.000Z');

    beforeEach(async () => {
      bitcoin = await service.createAsset({ ticker: 'BTC', name: 'Bitcoin', assetType: AssetType.CRYPTO });
    });

    it('prefers the provider series', async () => {
      marketData.get24hSeries.mockResolvedValue([1, 2, 3]);

      const sparkline = await service.buildSparkline(bitcoin, quote({ price: 3 }), 'USD', now);

      expect(sparkline.source).toBe('provider');
      expect(sparkline.points).toEqual([1, 2, 3]);
    });

    it('uses stored closes of the last 24 hours next', async () => {
      await prices.save([
        prices.create({ assetId: bitcoin.id, date: new Date('2026-03-09T08:00:00.000Z'), openPrice: 1, highPrice: 1, lowPrice: 1, closePrice: 1, volume: 0 }),
        prices.create({ assetId: bitcoin.id, date: new Date('2026-03-09T18:00:00.000Z'), openPrice: 2, highPrice: 2, lowPrice: 2, closePrice: 2, volume: 0 }),
        prices.create({ assetId: bitcoin.id, date: new Date('2026-03-10T06:00:00.000Z'), openPrice: 3, highPrice: 3, lowPrice: 3, closePrice: 3, volume: 0 }),
      ]);

      const sparkline = await service.buildSparkline(bitcoin, undefined, 'USD', now);

      expect(sparkline.source).toBe('history');
      expect(sparkline.points).toEqual([2, 3]);
    });

    it('interpolates from the close implied by the 24h change', async () => {
      const sparkline = await service.buildSparkline(bitcoin, quote({ price: 50000, change24h: 25 }), 'EUR', now);

      expect(sparkline.source).toBe('interpolated');
      expect(sparkline.points).toHaveLength(24);
      expect(sparkline.points[0]).toBe(40000);
      expect(sparkline.points[23]).toBe(50000);
    });

    it('draws a flat line when only the price is known', async () => {
      const sparkline = await service.buildSparkline(bitcoin, quote({ price: 42 }), 'USD', now);

      expect(sparkline.source).toBe('flat');
      expect(sparkline.points).toEqual(Array.from({ length: 24 }, () => 42));
      expect(sparkline.svg).toContain('stroke="#888"');
    });

    it('renders the empty placeholder without any data', async () => {
      const sparkline = await service.buildSparkline(bitcoin, undefined, 'USD', now);

      expect(sparkline.source).toBe('none');
      expect(sparkline.svg).toContain('<rect width="100%" height="100%" fill="none"/>');
    });
  });

  it('assembles the asset detail', async () => {
    const apple = await service.createAsset({ ticker: 'AAPL', name: 'Apple', assetType: AssetType.STOCK });
    await service.upsertBar(apple, { ...bar, date: new Date('2026-03-02T00:00:00.000Z') });
    await service.upsertBar(apple, { ...bar, date: new Date('2026-03-01T00:00:00.000Z'), closePrice: 99 });

    const detail = await service.getAssetDetail('AAPL');

    expect(detail).toMatchObject({ ticker: 'AAPL', price: null, stats: null, predictions: [], news: [], sentiments: [] });
    expect(detail.prices.map((row) => row.closePrice)).toEqual([99, 104]);
    expect(predictionsService.latestByHorizon).toHaveBeenCalledWith(apple.id);
  });
});
