import { Module } from '@nestjs/common';
import { FinnhubService } from './finnhub.service';
import { CoinMarketCapService } from './coinmarketcap.service';
import { CoinGeckoService } from './coingecko.service';
import { MarketDataService } from './market-data.service';

@Module({
  providers: [FinnhubService, CoinMarketCapService, CoinGeckoService, MarketDataService],
  exports: [MarketDataService],
})
export class MarketDataModule {}
