import { Injectable } from '@nestjs/common';
import { Asset, AssetType } from '../../entities/asset.entity';
import { FinnhubService } from './finnhub.service';
import { CoinMarketCapService } from './coinmarketcap.service';
import { CoinGeckoService } from './coingecko.service';
import { CryptoQuote, LiveQuote, StockQuote } from './market-data.types';

/**
 * Routes quote and series lookups to the provider matching each asset type.
 */
@Injectable()
export class MarketDataService {
  constructor(
    private readonly finnhub: FinnhubService,
    private readonly coinMarketCap: CoinMarketCapService,
    private readonly coinGecko: CoinGeckoService,
  ) {}

  /**
   * Live quotes keyed by upper-case ticker. Assets without a quote are absent.
   */
  async getQuotes(
    assets: Pick<Asset, 'ticker' | 'assetType'>[],
    currency: string = 'USD',
  ): Promise<Map<string, LiveQuote>> {
    const stocks = assets.filter((a) => a.assetType === AssetType.STOCK).map((a) => a.ticker);
    const cryptos = assets.filter((a) => a.assetType === AssetType.CRYPTO).map((a) => a.ticker);

    const [stockQuotes, cryptoQuotes] = await Promise.all([
      stocks.length
        ? this.finnhub.getQuotes(stocks)
        : Promise.resolve(new Map<string, StockQuote>()),
      cryptos.length
        ? this.coinMarketCap.getQuotes(cryptos, currency)
        : Promise.resolve(new Map<string, CryptoQuote>()),
    ]);

    const quotes = new Map<string, LiveQuote>();
    for (const quote of stockQuotes.values()) {
      quotes.set(quote.symbol, {
        price: quote.price,
        change24h: quote.percentChange,
        prevClose: quote.prevClose,
        open: quote.open,
        high: quote.high,
        low: quote.low,
        volume24h: null,
        marketCap: null,
      });
    }
    for (const quote of cryptoQuotes.values()) {
      quotes.set(quote.symbol, {
        price: quote.price,
        change24h: quote.percentChange24h,
        prevClose: null,
        open: null,
        high: null,
        low: null,
        volume24h: quote.volume24h,
        marketCap: quote.marketCap,
      });
    }
    return quotes;
  }

  get24hSeries(
    asset: Pick<Asset, 'ticker' | 'assetType'>,
    currency: string = 'USD',
  ): Promise<number[]> {
    if (asset.assetType === AssetType.STOCK) {
      return this.finnhub.get24hSeries(asset.ticker);
    }
    return this.coinGecko.get24hSeries(asset.ticker, currency);
  }
}
