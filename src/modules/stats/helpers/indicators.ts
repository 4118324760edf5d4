export interface IndicatorSet {
  volatility: number | null;
  rsi: number | null;
  movingAverage50: number | null;
  movingAverage200: number | null;
}

function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function simpleMovingAverage(closes: number[], period: number): number | null {
  if (closes.length < period) return null;
  const window = closes.slice(-period);
  return window.reduce((sum, close) => sum + close, 0) / period;
}

/**
 * RSI with Wilder's smoothing.
 */
export function relativeStrengthIndex(closes: number[], period: number = 14): number | null {
  if (closes.length < period + 1) {
    return null;
  }

  let gains = 0;
  let losses = 0;

  for (let i = 1; i <= period; i++) {
    const change = closes[i] - closes[i - 1];
    if (change > 0) {
      gains += change;
    } else {
      losses += Math.abs(change);
    }
  }

  let avgGain = gains / period;
  let avgLoss = losses / period;

  for (let i = period + 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? Math.abs(change) : 0;

    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
  }

  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/**
 * Population standard deviation of simple daily returns, in percent.
 */
export function dailyVolatility(closes: number[]): number | null {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    if (closes[i - 1] === 0) continue;
    returns.push((closes[i] - closes[i - 1]) / closes[i - 1]);
  }
  if (returns.length < 2) return null;

  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / returns.length;
  return Math.sqrt(variance) * 100;
}

/** Closes oldest first. */
export function computeIndicators(closes: number[]): IndicatorSet {
  const volatility = dailyVolatility(closes);
  const rsi = relativeStrengthIndex(closes, 14);
  const movingAverage50 = simpleMovingAverage(closes, 50);
  const movingAverage200 = simpleMovingAverage(closes, 200);

  return {
    volatility: volatility === null ? null : round(volatility, 4),
    rsi: rsi === null ? null : round(rsi, 2),
    movingAverage50: movingAverage50 === null ? null : round(movingAverage50, 8),
    movingAverage200: movingAverage200 === null ? null : round(movingAverage200, 8),
  };
}
