import { Asset } from './asset.entity';
import { AssetStats } from './asset-stats.entity';
import { AuthSession } from './auth-session.entity';
import { ContactMessage } from './contact-message.entity';
import { HistoricalPrice } from './historical-price.entity';
import { News } from './news.entity';
import { PricePrediction } from './price-prediction.entity';
import { Sentiment } from './sentiment.entity';
import { User } from './user.entity';
import { UserPredictionHistory } from './user-prediction-history.entity';
import { UserProfile } from './user-profile.entity';

export const ENTITIES = [
  Asset,
  AssetStats,
  AuthSession,
  ContactMessage,
  HistoricalPrice,
  News,
  PricePrediction,
  Sentiment,
  User,
  UserPredictionHistory,
  UserProfile,
];
