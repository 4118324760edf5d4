import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { EnvConfig } from '../../config/env.validation';
import { errorMessage } from '../../utils/errors';
import { CryptoQuote, normalizeSymbols, toFiniteNumber } from './market-data.types';

const CMC_QUOTES_URL = 'https://pro-api.coinmarketcap.com/v1/cryptocurrency/quotes/latest';

interface CmcQuoteValues {
  price?: number | null;
  percent_change_24h?: number | null;
  volume_24h?: number | null;
  market_cap?: number | null;
}

interface CmcQuotesResponse {
  data?: Record<string, { quote?: Record<string, CmcQuoteValues> } | undefined>;
}

@Injectable()
export class CoinMarketCapService {
  private readonly logger = new Logger(CoinMarketCapService.name);

  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  /**
   * Latest quotes for all symbols in a single request.
   */
  async getQuotes(
    symbols: Iterable<string>,
    convert: string = 'USD',
  ): Promise<Map<string, CryptoQuote>> {
    const result = new Map<string, CryptoQuote>();
    const apiKey = this.configService.get('CMC_API_KEY', { infer: true });
    if (!apiKey) {
      this.logger.debug('CMC_API_KEY not set; skipping crypto quotes');
      return result;
    }

    const normalized = normalizeSymbols(symbols);
    if (!normalized.length) return result;

    try {
      const response = await axios.get<CmcQuotesResponse>(CMC_QUOTES_URL, {
        headers: {
          Accept: 'application/json',
          'Accept-Encoding': 'deflate, gzip',
          'X-CMC_PRO_API_KEY': apiKey,
        },
        params: { symbol: normalized.join(','), convert },
        timeout: this.configService.get('PROVIDER_TIMEOUT_MS', { infer: true }),
      });

      const data = response.data.data ?? {};
      for (const symbol of normalized) {
        const values = data[symbol]?.quote?.[convert];
        const price = toFiniteNumber(values?.price);
        if (!values || price === null || price <= 0) continue;

        result.set(symbol, {
          symbol,
          price,
          percentChange24h: toFiniteNumber(values.percent_change_24h),
          volume24h: toFiniteNumber(values.volume_24h),
          marketCap: toFiniteNumber(values.market_cap),
        });
      }
    } catch (error) {
      this.logger.error(`Failed to fetch prices from CoinMarketCap: ${errorMessage(error)}`);
    }

    return result;
  }
}
