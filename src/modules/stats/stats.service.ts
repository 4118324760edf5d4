import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Asset } from '../../entities/asset.entity';
import { AssetStats } from '../../entities/asset-stats.entity';
import { HistoricalPrice } from '../../entities/historical-price.entity';
import { computeIndicators } from './helpers/indicators';

// Enough daily closes for the 200-day average.
const LOOKBACK = 250;

@Injectable()
export class StatsService {
  private readonly logger = new Logger(StatsService.name);

  constructor(
    @InjectRepository(AssetStats) private readonly statsRepository: Repository<AssetStats>,
    @InjectRepository(HistoricalPrice) private readonly priceRepository: Repository<HistoricalPrice>,
  ) {}

  /**
   * Recomputes the asset's single stats row from its stored daily closes.
   */
  async recompute(asset: Asset, manager?: EntityManager): Promise<AssetStats> {
    const stats = manager ? manager.getRepository(AssetStats) : this.statsRepository;
    const prices = manager ? manager.getRepository(HistoricalPrice) : this.priceRepository;

    const rows = await prices.find({
      where: { assetId: asset.id },
      order: { date: 'DESC' },
      take: LOOKBACK,
    });
    const indicators = computeIndicators(rows.map((row) => row.closePrice).reverse());

    const existing = await stats.findOne({ where: { assetId: asset.id } });
    const saved = await stats.save(
      existing ? stats.merge(existing, indicators) : stats.create({ assetId: asset.id, ...indicators }),
    );

    this.logger.debug(`Stats for ${asset.ticker} recomputed from ${rows.length} closes`);
    return saved;
  }
}
