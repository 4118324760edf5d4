import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Asset, AssetType } from '../../entities/asset.entity';
import { News } from '../../entities/news.entity';
import { PricePrediction } from '../../entities/price-prediction.entity';
import { UserPredictionHistory } from '../../entities/user-prediction-history.entity';
import { FAVORITES_TABLE, SubscriptionPlan, UserProfile } from '../../entities/user-profile.entity';
import { User } from '../../entities/user.entity';
import { AssetQuoteView, AssetsService } from '../assets/assets.service';
import { NewsService } from '../news/news.service';
import { PredictionView, PredictionsService } from '../predictions/predictions.service';

const PROFILE_PREDICTIONS = 5;
const DASHBOARD_PREDICTIONS = 10;
const DASHBOARD_VIEWED = 10;
const DASHBOARD_NEWS = 5;

export interface FavoriteAsset {
  id: string;
  ticker: string;
  name: string;
  assetType: AssetType;
}

export interface ProfileView {
  userId: string;
  username: string;
  subscriptionPlan: SubscriptionPlan;
  favorites: FavoriteAsset[];
  recentPredictions: PredictionView[];
}

export interface ViewedPrediction {
  viewedAt: Date;
  prediction: PredictionView;
}

export interface Dashboard {
  favorites: AssetQuoteView[];
  predictions: PredictionView[];
  viewed: ViewedPrediction[];
  cryptoNews: News[];
}

export interface FavoriteState {
  ticker: string;
  isFavorite: boolean;
}

@Injectable()
export class ProfileService {
  private readonly logger = new Logger(ProfileService.name);

  constructor(
    @InjectRepository(UserProfile) private readonly profileRepository: Repository<UserProfile>,
    @InjectRepository(UserPredictionHistory)
    private readonly historyRepository: Repository<UserPredictionHistory>,
    private readonly assetsService: AssetsService,
    private readonly predictionsService: PredictionsService,
    private readonly newsService: NewsService,
  ) {}

  async getProfile(user: User): Promise<ProfileView> {
    const profile = await this.loadProfile(user.id);
    const favorites = this.favoritesOf(profile);

    return {
      userId: user.id,
      username: user.username,
      subscriptionPlan: profile.subscriptionPlan,
      favorites: favorites.map(({ id, ticker, name, assetType }) => ({ id, ticker, name, assetType })),
      recentPredictions: await this.predictionsService.listLatest(
        PROFILE_PREDICTIONS,
        favorites.map((asset) => asset.id),
      ),
    };
  }

  async addFavorite(user: User, ticker: string): Promise<FavoriteState> {
    const asset = await this.assetsService.findByTicker(ticker);
    const profile = await this.loadProfile(user.id);

    if (!this.favoritesOf(profile).some((favorite) => favorite.id === asset.id)) {
      // A concurrent add of the same pair lands on the primary key; ignore it.
      await this.profileRepository
        .createQueryBuilder()
        .insert()
        .into(FAVORITES_TABLE, ['profileId', 'assetId'])
        .values({ profileId: profile.id, assetId: asset.id })
        .orIgnore()
        .execute();
      this.logger.debug(`User ${user.id} added favorite ${asset.ticker}`);
    }
    return { ticker: asset.ticker, isFavorite: true };
  }

  async removeFavorite(user: User, ticker: string): Promise<FavoriteState> {
    const asset = await this.assetsService.findByTicker(ticker);
    const profile = await this.loadProfile(user.id);

    if (this.favoritesOf(profile).some((favorite) => favorite.id === asset.id)) {
      await this.favoritesRelation(profile).remove(asset.id);
      this.logger.debug(`User ${user.id} removed favorite ${asset.ticker}`);
    }
    return { ticker: asset.ticker, isFavorite: false };
  }

  async toggleFavorite(user: User, ticker: string): Promise<FavoriteState> {
    const asset = await this.assetsService.findByTicker(ticker);
    const profile = await this.loadProfile(user.id);
    const isFavorite = this.favoritesOf(profile).some((favorite) => favorite.id === asset.id);

    return isFavorite ? this.removeFavorite(user, asset.ticker) : this.addFavorite(user, asset.ticker);
  }

  async setSubscriptionPlan(userId: string, plan: SubscriptionPlan): Promise<UserProfile> {
    const profile = await this.profileRepository.findOne({ where: { userId } });
    if (!profile) {
      throw new NotFoundException(`No profile for user ${userId}`);
    }
    profile.subscriptionPlan = plan;
    const saved = await this.profileRepository.save(profile);
    this.logger.log(`User ${userId} moved to the ${plan} plan`);
    return saved;
  }

  async getDashboard(user: User): Promise<Dashboard> {
    const profile = await this.loadProfile(user.id);
    const favorites = this.favoritesOf(profile);

    const [quoted, predictions, viewed, cryptoNews] = await Promise.all([
      this.assetsService.quoteViews(favorites),
      this.predictionsService.listLatest(
        DASHBOARD_PREDICTIONS,
        favorites.map((asset) => asset.id),
      ),
      this.getPredictionHistory(user, DASHBOARD_VIEWED),
      this.newsService.getFeed({ assetType: AssetType.CRYPTO, limit: DASHBOARD_NEWS }),
    ]);

    return { favorites: quoted, predictions, viewed, cryptoNews };
  }

  /** Most recent views first. */
  async getPredictionHistory(user: User, limit = 20): Promise<ViewedPrediction[]> {
    const rows = await this.historyRepository.find({
      where: { userId: user.id },
      relations: { prediction: { asset: true } },
      order: { viewedAt: 'DESC' },
      take: limit,
    });

    const predictions = rows
      .map((row) => row.prediction)
      .filter((prediction): prediction is PricePrediction => prediction !== undefined);
    const views = new Map(
      (await this.predictionsService.describe(predictions)).map((view) => [view.id, view]),
    );

    return rows.flatMap((row) => {
      const view = views.get(row.predictionId);
      return view ? [{ viewedAt: row.viewedAt, prediction: view }] : [];
    });
  }

  private async loadProfile(userId: string): Promise<UserProfile> {
    const profile = await this.profileRepository.findOne({
      where: { userId },
      relations: { favoriteAssets: true },
    });
    if (!profile) {
      throw new NotFoundException(`No profile for user ${userId}`);
    }
    return profile;
  }

  private favoritesOf(profile: UserProfile): Asset[] {
    return [...(profile.favoriteAssets ?? [])].sort((a, b) => a.ticker.localeCompare(b.ticker));
  }

  private favoritesRelation(profile: UserProfile) {
    return this.profileRepository
      .createQueryBuilder()
      .relation(UserProfile, 'favoriteAssets')
      .of(profile.id);
  }
}
