import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  UpdateDateColumn,
  OneToOne,
  JoinColumn,
} from 'typeorm';
import { numericTransformer } from '../utils/column-transformers';
import { Asset } from './asset.entity';

@Entity('asset_stats')
export class AssetStats {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  assetId!: string;

  @OneToOne(() => Asset, (asset) => asset.stats, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'assetId' })
  asset?: Asset;

  @Column('float', { nullable: true })
  volatility!: number | null;

  @Column('float', { nullable: true })
  rsi!: number | null;

  @Column('decimal', {
    precision: 20,
    scale: 8,
    nullable: true,
    transformer: numericTransformer,
  })
  movingAverage50!: number | null;

  @Column('decimal', {
    precision: 20,
    scale: 8,
    nullable: true,
    transformer: numericTransformer,
  })
  movingAverage200!: number | null;

  @UpdateDateColumn()
  lastUpdated!: Date;
}
