export interface OhlcBar {
  openPrice: number;
  highPrice: number;
  lowPrice: number;
  closePrice: number;
}

/**
 * The first broken bound of a daily bar, or null for a consistent bar.
 */
export function ohlcViolation(bar: OhlcBar): string | null {
  if (bar.highPrice < bar.lowPrice) return 'highPrice must not be below lowPrice';
  if (bar.highPrice < Math.max(bar.openPrice, bar.closePrice)) {
    return 'highPrice must be at least the open and close prices';
  }
  if (bar.lowPrice > Math.min(bar.openPrice, bar.closePrice)) {
    return 'lowPrice must be at most the open and close prices';
  }
  return null;
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}
