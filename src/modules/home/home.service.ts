import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Asset } from '../../entities/asset.entity';
import { AssetStats } from '../../entities/asset-stats.entity';
import { UserProfile } from '../../entities/user-profile.entity';
import { User } from '../../entities/user.entity';
import { AssetQuoteView, AssetsService } from '../assets/assets.service';
import { PredictionView, PredictionsService } from '../predictions/predictions.service';

const HIGHLIGHTED_ASSETS = 6;
const LATEST_PREDICTIONS = 5;

export interface HighlightedAsset extends AssetQuoteView {
  stats: AssetStats | null;
  isFavorite: boolean;
}

export interface HomeView {
  assets: HighlightedAsset[];
  latestPredictions: PredictionView[];
}

@Injectable()
export class HomeService {
  constructor(
    @InjectRepository(Asset) private readonly assetRepository: Repository<Asset>,
    @InjectRepository(AssetStats) private readonly statsRepository: Repository<AssetStats>,
    @InjectRepository(UserProfile) private readonly profileRepository: Repository<UserProfile>,
    private readonly assetsService: AssetsService,
    private readonly predictionsService: PredictionsService,
  ) {}

  async getHome(user?: User): Promise<HomeView> {
    const assets = await this.assetRepository.find({
      order: { ticker: 'ASC' },
      take: HIGHLIGHTED_ASSETS,
    });
    const assetIds = assets.map((asset) => asset.id);

    const [views, stats, favoriteIds, latestPredictions] = await Promise.all([
      this.assetsService.quoteViews(assets),
      assetIds.length
        ? this.statsRepository.find({ where: { assetId: In(assetIds) } })
        : Promise.resolve<AssetStats[]>([]),
      this.favoriteIds(user),
      this.predictionsService.listLatest(LATEST_PREDICTIONS),
    ]);
    const statsByAsset = new Map(stats.map((row) => [row.assetId, row]));

    return {
      assets: views.map((view) => ({
        ...view,
        stats: statsByAsset.get(view.id) ?? null,
        isFavorite: favoriteIds.has(view.id),
      })),
      latestPredictions,
    };
  }

  private async favoriteIds(user?: User): Promise<Set<string>> {
    if (!user) return new Set();
    const profile = await this.profileRepository.findOne({
      where: { userId: user.id },
      relations: { favoriteAssets: true },
    });
    return new Set((profile?.favoriteAssets ?? []).map((asset) => asset.id));
  }
}
