import { AssetType } from '../../../entities/asset.entity';
import { LiveQuote } from '../../market-data/market-data.types';
import { DailyBar } from '../../assets/assets.service';

/**
 * Today's bar from a live quote. Stock quotes carry their own open, high
 * and low; crypto quotes only a price and a 24h change, so the open is
 * backed out of the change.
 */
export function dailyBarFromQuote(assetType: AssetType, quote: LiveQuote, date: Date): DailyBar {
  const close = quote.price;

  let open = close;
  if (assetType === AssetType.STOCK && quote.open !== null && quote.open > 0) {
    open = quote.open;
  } else if (assetType === AssetType.CRYPTO && quote.change24h !== null && quote.change24h > -100) {
    open = close / (1 + quote.change24h / 100);
  }

  const high = Math.max(open, close, assetType === AssetType.STOCK ? quote.high ?? 0 : 0);
  const lows = [open, close];
  if (assetType === AssetType.STOCK && quote.low !== null && quote.low > 0) lows.push(quote.low);

  return {
    date,
    openPrice: open,
    highPrice: high,
    lowPrice: Math.min(...lows),
    closePrice: close,
    volume: quote.volume24h ?? 0,
  };
}
