import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  OneToMany,
  OneToOne,
  ManyToMany,
} from 'typeorm';
import { numericTransformer } from '../utils/column-transformers';
import { HistoricalPrice } from './historical-price.entity';
import { PricePrediction } from './price-prediction.entity';
import { News } from './news.entity';
import { Sentiment } from './sentiment.entity';
import { AssetStats } from './asset-stats.entity';
import { UserProfile } from './user-profile.entity';

export enum AssetType {
  STOCK = 'STOCK',
  CRYPTO = 'CRYPTO',
}

export const ASSET_TYPE_LABELS: Record<AssetType, string> = {
  [AssetType.STOCK]: 'Stock',
  [AssetType.CRYPTO]: 'Cryptocurrency',
};

@Entity('assets')
export class Asset {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 10, unique: true })
  ticker!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  // Not exposed by any update path once the row exists.
  @Column({ type: 'simple-enum', enum: AssetType })
  assetType!: AssetType;

  @Column('decimal', {
    precision: 20,
    scale: 2,
    nullable: true,
    transformer: numericTransformer,
  })
  marketCap!: number | null;

  @CreateDateColumn()
  createdAt!: Date;

  @OneToMany(() => HistoricalPrice, (price) => price.asset)
  prices?: HistoricalPrice[];

  @OneToMany(() => PricePrediction, (prediction) => prediction.asset)
  predictions?: PricePrediction[];

  @OneToMany(() => News, (news) => news.asset)
  news?: News[];

  @OneToMany(() => Sentiment, (sentiment) => sentiment.asset)
  sentiments?: Sentiment[];

  @OneToOne(() => AssetStats, (stats) => stats.asset)
  stats?: AssetStats | null;

  // Sets the asset-side foreign key of the favorites join table.
  @ManyToMany(() => UserProfile, (profile) => profile.favoriteAssets, { onDelete: 'CASCADE' })
  fans?: UserProfile[];
}
