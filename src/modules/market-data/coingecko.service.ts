import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { EnvConfig } from '../../config/env.validation';
import { errorMessage } from '../../utils/errors';

type CoinListItem = { id?: string; symbol?: string };
type SearchResponse = { coins?: CoinListItem[] };
type MarketChartResponse = { prices?: Array<[number, number]> };

const ID_MAP_TTL_MS = 60 * 60 * 1000;

// Symbols shared by many tokens; these always resolve to the major coin.
const MANUAL_OVERRIDES: Record<string, string> = {
  btc: 'bitcoin',
  eth: 'ethereum',
  usdt: 'tether',
};

/**
 * Public CoinGecko API, used only for 24h crypto series.
 */
@Injectable()
export class CoinGeckoService {
  private readonly logger = new Logger(CoinGeckoService.name);
  private idMap: { ids: Map<string, string>; fetchedAt: number } = {
    ids: new Map(),
    fetchedAt: 0,
  };
  private inFlight?: Promise<void>;

  constructor(private readonly configService: ConfigService<EnvConfig, true>) {}

  async get24hSeries(symbol: string, convert: string = 'USD'): Promise<number[]> {
    const key = symbol.trim().toLowerCase();
    if (!key) return [];

    try {
      let coinId = await this.resolveId(key);
      if (!coinId) {
        coinId = await this.searchId(key);
        if (!coinId) return [];
        this.idMap.ids.set(key, coinId);
      }

      const prices = await this.fetchSeries(coinId, convert).catch((error: unknown) => {
        this.logger.debug(`CoinGecko series for ${coinId} failed: ${errorMessage(error)}`);
        return [];
      });
      if (prices.length) return prices;

      const fallbackId = await this.searchId(key);
      if (!fallbackId || fallbackId === coinId) return [];

      const fallbackPrices = await this.fetchSeries(fallbackId, convert);
      if (fallbackPrices.length) {
        this.idMap.ids.set(key, fallbackId);
      }
      return fallbackPrices;
    } catch (error) {
      this.logger.debug(`Failed to fetch 24h series from CoinGecko for ${symbol}: ${errorMessage(error)}`);
      return [];
    }
  }

  async resolveId(symbol: string): Promise<string | undefined> {
    const key = symbol.toLowerCase();
    if (MANUAL_OVERRIDES[key]) return MANUAL_OVERRIDES[key];
    await this.ensureIdMapFresh();
    return this.idMap.ids.get(key);
  }

  private async ensureIdMapFresh(): Promise<void> {
    if (this.idMap.ids.size && Date.now() - this.idMap.fetchedAt < ID_MAP_TTL_MS) return;
    if (!this.inFlight) {
      this.inFlight = this.refreshIdMap()
        .catch((error: unknown) => {
          this.logger.debug(`Failed to build CoinGecko id map: ${errorMessage(error)}`);
        })
        .finally(() => {
          this.inFlight = undefined;
        });
    }
    await this.inFlight;
  }

  private async refreshIdMap(): Promise<void> {
    const response = await axios.get<CoinListItem[]>(`${this.baseUrl()}/coins/list`, {
      timeout: this.timeoutMs(),
    });

    const ids = new Map<string, string>();
    for (const item of Array.isArray(response.data) ? response.data : []) {
      if (!item.symbol || !item.id) continue;
      const key = item.symbol.toLowerCase();
      // First listing wins for a shared symbol.
      if (!ids.has(key)) ids.set(key, item.id);
    }
    for (const [key, id] of Object.entries(MANUAL_OVERRIDES)) {
      ids.set(key, id);
    }

    this.idMap = { ids, fetchedAt: Date.now() };
  }

  /**
   * Exact symbol match first, otherwise the first hit.
   */
  private async searchId(symbol: string): Promise<string | undefined> {
    try {
      const response = await axios.get<SearchResponse>(`${this.baseUrl()}/search`, {
        params: { query: symbol },
        timeout: this.timeoutMs(),
      });
      const coins = response.data.coins ?? [];
      const exact = coins.find((coin) => coin.symbol?.toLowerCase() === symbol);
      return exact?.id ?? coins[0]?.id;
    } catch (error) {
      this.logger.debug(`CoinGecko search failed for ${symbol}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async fetchSeries(coinId: string, convert: string): Promise<number[]> {
    const response = await axios.get<MarketChartResponse>(
      `${this.baseUrl()}/coins/${encodeURIComponent(coinId)}/market_chart`,
      {
        params: { vs_currency: convert.toLowerCase(), days: 1 },
        timeout: this.timeoutMs(),
      },
    );
    return (response.data.prices ?? [])
      .map((point) => Number(point[1]))
      .filter((value) => Number.isFinite(value));
  }

  private baseUrl(): string {
    return this.configService.get('COINGECKO_BASE_URL', { infer: true });
  }

  private timeoutMs(): number {
    return this.configService.get('PROVIDER_TIMEOUT_MS', { infer: true });
  }
}
