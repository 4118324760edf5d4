export interface StockQuote {
  symbol: string;
  price: number;
  percentChange: number | null;
  prevClose: number | null;
  open: number | null;
  high: number | null;
  low: number | null;
  timestamp: number | null;
}

export interface CryptoQuote {
  symbol: string;
  price: number;
  percentChange24h: number | null;
  volume24h: number | null;
  marketCap: number | null;
}

/** Provider-neutral quote attached to assets in read models. */
export interface LiveQuote {
  price: number;
  change24h: number | null;
  prevClose: number | null;
  open: number | null;
  high: number | null;
  low: number | null;
  volume24h: number | null;
  marketCap: number | null;
}

export const SUPPORTED_CURRENCIES = ['USD', 'EUR', 'RUB'] as const;
export type Currency = (typeof SUPPORTED_CURRENCIES)[number];

export function isSupportedCurrency(value: string): value is Currency {
  return (SUPPORTED_CURRENCIES as readonly string[]).includes(value);
}

export function normalizeSymbols(symbols: Iterable<string>): string[] {
  const unique = new Set<string>();
  for (const symbol of symbols) {
    const trimmed = symbol?.trim();
    if (trimmed) unique.add(trimmed.toUpperCase());
  }
  return [...unique];
}

export function toFiniteNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}
