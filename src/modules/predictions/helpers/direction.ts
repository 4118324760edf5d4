export type PriceDirection = 'up' | 'down' | 'neutral';

/**
 * Moves inside ±1% of the current price read as neutral.
 */
export function predictionDirection(
  predictedPrice: number,
  currentPrice: number | null | undefined,
): PriceDirection {
  if (!currentPrice) return 'neutral';
  if (predictedPrice > currentPrice * 1.01) return 'up';
  if (predictedPrice < currentPrice * 0.99) return 'down';
  return 'neutral';
}
