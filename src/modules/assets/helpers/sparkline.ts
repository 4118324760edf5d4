export interface SparklineOptions {
  width?: number;
  height?: number;
}

const RISING = '#1ca01c';
const FALLING = '#e53935';
const FLAT = '#888';

/**
 * Inline SVG polyline scaled to the min/max of the series. Higher prices
 * sit closer to the top; the stroke colour follows first-to-last change.
 */
export function sparklineSvg(prices: number[], options: SparklineOptions = {}): string {
  const { width = 120, height = 28 } = options;
  const frame = `width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" xmlns="http://www.w3.org/2000/svg"`;

  let points = prices.filter((p) => Number.isFinite(p));
  if (!points.length) {
    return `<svg ${frame}><rect width="100%" height="100%" fill="none"/></svg>`;
  }
  if (points.length === 1) {
    points = [points[0], points[0]];
  }

  const min = Math.min(...points);
  const max = Math.max(...points);
  const span = max !== min ? max - min : 1;
  const stepX = width / (points.length - 1);

  const coordinates = points
    .map((price, i) => {
      const x = i * stepX;
      const y = height - ((price - min) / span) * height;
      return `${x.toFixed(2)},${y.toFixed(2)}`;
    })
    .join(' ');

  return (
    `<svg ${frame} preserveAspectRatio="none">` +
    `<polyline fill="none" stroke="${trendColor(points)}" stroke-width="1.5" points="${coordinates}" stroke-linecap="round" stroke-linejoin="round" />` +
    '</svg>'
  );
}

function trendColor(points: number[]): string {
  const first = points[0];
  const last = points[points.length - 1];
  if (first === 0) return FLAT;
  const change = (last - first) / first;
  if (change > 0) return RISING;
  if (change < 0) return FALLING;
  return FLAT;
}

/**
 * Evenly spaced points from the previous close to the current price.
 */
export function interpolateSeries(from: number, to: number, points: number = 24): number[] {
  if (points < 2) return [to];
  return Array.from({ length: points }, (_, i) => from + (to - from) * (i / (points - 1)));
}
