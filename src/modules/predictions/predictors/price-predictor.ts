import { Asset } from '../../../entities/asset.entity';
import { PredictionHorizon } from '../../../entities/price-prediction.entity';

export interface PredictionInput {
  asset: Pick<Asset, 'id' | 'ticker' | 'assetType'>;
  horizon: PredictionHorizon;
  currentPrice: number;
  /** Closing prices, oldest first. */
  closes: number[];
}

export interface PredictionOutput {
  predictedPrice: number;
  confidence: number;
  modelVersion: string;
}

export interface PricePredictor {
  readonly modelVersion: string;
  predict(input: PredictionInput): PredictionOutput;
}

export const PRICE_PREDICTOR = Symbol('PRICE_PREDICTOR');

export type { RandomSource } from '../../../utils/random';

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
