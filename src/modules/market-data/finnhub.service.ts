import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { EnvConfig } from '../../config/env.validation';
import { errorMessage } from '../../utils/errors';
import { StockQuote, normalizeSymbols, toFiniteNumber } from './market-data.types';

const FINNHUB_BASE_URL = 'https://finnhub.io/api/v1';

interface FinnhubQuoteResponse {
  c?: number | null;
  h?: number | null;
  l?: number | null;
  o?: number | null;
  pc?: number | null;
  t?: number | null;
}

interface FinnhubCandleResponse {
  s?: string;
  c?: Array<number | null>;
  t?: number[];
  error?: string;
}

/**
 * Finnhub stock quotes and intraday candles.
 * Free keys get 403 on /stock/candle; callers fall back to stored history.
 */
@Injectable()
export class FinnhubService {
  private readonly logger = new Logger(FinnhubService.name);

  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  async getQuotes(symbols: Iterable<string>): Promise<Map<string, StockQuote>> {
    const result = new Map<string, StockQuote>();
    const apiKey = this.apiKey();
    if (!apiKey) {
      this.logger.debug('FINNHUB_API_KEY not set; skipping stock quotes');
      return result;
    }

    for (const symbol of normalizeSymbols(symbols)) {
      try {
        const response = await axios.get<FinnhubQuoteResponse>(`${FINNHUB_BASE_URL}/quote`, {
          params: { symbol, token: apiKey },
          timeout: this.timeoutMs(),
        });
        const quote = this.parseQuote(symbol, response.data);
        if (quote) result.set(symbol, quote);
      } catch (error) {
        this.logger.debug(`Failed to fetch Finnhub quote for ${symbol}: ${errorMessage(error)}`);
      }
    }

    return result;
  }

  parseQuote(symbol: string, payload: FinnhubQuoteResponse): StockQuote | null {
    // Unknown and delisted symbols come back with c = 0.
    const price = toFiniteNumber(payload.c);
    if (price === null || price <= 0) return null;

    const prevClose = toFiniteNumber(payload.pc);
    const percentChange =
      prevClose !== null && prevClose !== 0 ? ((price - prevClose) / prevClose) * 100 : null;

    return {
      symbol,
      price,
      percentChange,
      prevClose,
      open: toFiniteNumber(payload.o),
      high: toFiniteNumber(payload.h),
      low: toFiniteNumber(payload.l),
      timestamp: toFiniteNumber(payload.t),
    };
  }

  /**
   * 5-minute closes over the last 24 hours, oldest first.
   */
  async get24hSeries(symbol: string, now: Date = new Date()): Promise<number[]> {
    const apiKey = this.apiKey();
    if (!apiKey) {
      this.logger.warn(`FINNHUB_API_KEY not set; cannot fetch series for ${symbol}`);
      return [];
    }

    const to = Math.floor(now.getTime() / 1000);
    const from = to - 24 * 3600;

    try {
      const response = await axios.get<FinnhubCandleResponse>(`${FINNHUB_BASE_URL}/stock/candle`, {
        params: { symbol, resolution: '5', from, to, token: apiKey },
        timeout: this.timeoutMs(),
      });
      const data = response.data;

      if (data.s !== 'ok') {
        this.logger.warn(
          `Finnhub candle error for ${symbol}: status=${data.s}, error=${data.error ?? 'Unknown error'}`,
        );
        return [];
      }

      const closes = (data.c ?? [])
        .map((value) => toFiniteNumber(value))
        .filter((value): value is number => value !== null && value !== 0);

      if (!closes.length) {
        this.logger.warn(`Finnhub returned no usable closes for ${symbol}`);
      }
      return closes;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 403) {
        this.logger.warn(
          `Finnhub returned 403 for ${symbol} candles; the endpoint needs a paid plan`,
        );
      } else {
        this.logger.error(`Finnhub candle request failed for ${symbol}: ${errorMessage(error)}`);
      }
      return [];
    }
  }

  private apiKey(): string | undefined {
    return this.configService.get('FINNHUB_API_KEY', { infer: true });
  }

  private timeoutMs(): number {
    return this.configService.get('PROVIDER_TIMEOUT_MS', { infer: true });
  }
}
