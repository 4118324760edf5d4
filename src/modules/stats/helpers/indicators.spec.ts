import {
  computeIndicators,
  dailyVolatility,
  relativeStrengthIndex,
  simpleMovingAverage,
} from './indicators';

// 10, 11, 10, 11, ... 15 closes: seven gains and seven losses of 1.
const alternating = Array.from({ length: 15 }, (_, i) => (i % 2 === 0 ? 10 : 11));

describe('simpleMovingAverage', () => {
  it('averages the last `period` closes', () => {
    expect(simpleMovingAverage([100, 1, 2, 3, 4, 5], 5)).toBe(3);
  });

  it('is null for short history', () => {
    expect(simpleMovingAverage([1, 2, 3], 5)).toBeNull();
  });
});

describe('relativeStrengthIndex', () => {
  it('needs period + 1 closes', () => {
    expect(relativeStrengthIndex(alternating.slice(0, 14))).toBeNull();
  });

  it('is 50 for balanced gains and losses', () => {
    expect(relativeStrengthIndex(alternating)).toBe(50);
  });

  it('applies Wilder smoothing to later changes', () => {
    // avgGain (0.5 * 13 + 2) / 14, avgLoss 0.5 * 13 / 14 -> RS 8.5 / 6.5
    const rsi = relativeStrengthIndex([...alternating, 12]);

    expect(rsi).toBeCloseTo(56.6667, 4);
  });

  it('pins one-way markets to 100 and 0', () => {
    const rising = Array.from({ length: 15 }, (_, i) => 100 + i);
    expect(relativeStrengthIndex(rising)).toBe(100);
    expect(relativeStrengthIndex([...rising].reverse())).toBe(0);
  });
});

describe('dailyVolatility', () => {
  it('is the population std of simple returns in percent', () => {
    // returns +10% and -10%
    expect(dailyVolatility([100, 110, 99])).toBeCloseTo(10, 10);
  });

  it('is null with fewer than two returns', () => {
    expect(dailyVolatility([100, 110])).toBeNull();
  });
});

describe('computeIndicators', () => {
  it('rounds each indicator and leaves the long averages empty on short history', () => {
    expect(computeIndicators([...alternating, 12])).toEqual({
      volatility: expect.any(Number),
      rsi: 56.67,
      movingAverage50: null,
      movingAverage200: null,
    });
  });

  it('fills the 50-day average once there are 50 closes', () => {
    const closes = Array.from({ length: 60 }, (_, i) => i + 1);

    // mean of 11..60
    expect(computeIndicators(closes).movingAverage50).toBe(35.5);
    expect(computeIndicators(closes).movingAverage200).toBeNull();
  });
});
