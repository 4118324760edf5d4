import { PredictionInput, PredictionOutput, PricePredictor, RandomSource, roundTo } from './price-predictor';

/**
 * Coin-flip direction with a 0.5–5% move and 0.65–0.95 confidence.
 */
export class RandomWalkPredictor implements PricePredictor {
  readonly modelVersion = 'v1.0-random';

  constructor(private readonly random: RandomSource = Math.random) {}

  predict({ currentPrice }: PredictionInput): PredictionOutput {
    const up = this.random() < 0.5;
    const changePercent = this.uniform(0.5, 5.0);
    const predictedPrice = up
      ? currentPrice * (1 + changePercent / 100)
      : currentPrice * (1 - changePercent / 100);

    return {
      predictedPrice: roundTo(predictedPrice, 2),
      confidence: roundTo(this.uniform(0.65, 0.95), 2),
      modelVersion: this.modelVersion,
    };
  }

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }
}
