import { HORIZON_DAYS, PredictionHorizon } from '../../../entities/price-prediction.entity';
import { RandomWalkPredictor } from './random-walk.predictor';
import {
  PredictionInput,
  PredictionOutput,
  PricePredictor,
  RandomSource,
  clamp,
  roundTo,
} from './price-predictor';

const WINDOW = 30;
const MIN_POINTS = 5;

const HORIZON_DECAY: Record<PredictionHorizon, number> = {
  [PredictionHorizon.ONE_DAY]: 1,
  [PredictionHorizon.SEVEN_DAYS]: 0.8,
  [PredictionHorizon.THIRTY_DAYS]: 0.6,
};

export interface TrendFit {
  slope: number;
  intercept: number;
  rSquared: number;
}

/** Ordinary least squares over x = 0..n-1. */
export function fitLine(values: number[]): TrendFit {
  const n = values.length;
  const meanX = (n - 1) / 2;
  const meanY = values.reduce((sum, v) => sum + v, 0) / n;

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  values.forEach((y, x) => {
    sxy += (x - meanX) * (y - meanY);
    sxx += (x - meanX) ** 2;
    syy += (y - meanY) ** 2;
  });

  const slope = sxx === 0 ? 0 : sxy / sxx;
  const intercept = meanY - slope * meanX;
  // A perfectly flat series is perfectly explained by its (flat) line.
  const rSquared = syy === 0 ? 1 : (sxy * sxy) / (sxx * syy);

  return { slope, intercept, rSquared };
}

/**
 * Extends the least-squares line of recent daily closes from the current
 * price. Too little history falls back to the random walk.
 */
export class LinearTrendPredictor implements PricePredictor {
  readonly modelVersion = 'v1.1-trend';
  private readonly fallback: RandomWalkPredictor;

  constructor(random: RandomSource = Math.random) {
    this.fallback = new RandomWalkPredictor(random);
  }

  predict(input: PredictionInput): PredictionOutput {
    const closes = input.closes.slice(-WINDOW);
    if (closes.length < MIN_POINTS) {
      return this.fallback.predict(input);
    }

    const { slope, rSquared } = fitLine(closes);
    const days = HORIZON_DAYS[input.horizon];
    const predictedPrice = Math.max(0, input.currentPrice + slope * days);
    const confidence = clamp(rSquared, 0.05, 0.95) * HORIZON_DECAY[input.horizon];

    return {
      predictedPrice: roundTo(predictedPrice, 2),
      confidence: roundTo(confidence, 2),
      modelVersion: this.modelVersion,
    };
  }
}
