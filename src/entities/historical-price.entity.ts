import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
  Check,
} from 'typeorm';
import { numericTransformer } from '../utils/column-transformers';
import { Asset } from './asset.entity';

@Entity('historical_prices')
@Index(['assetId', 'date'], { unique: true })
@Check(`"highPrice" >= "lowPrice"`)
export class HistoricalPrice {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  assetId!: string;

  @ManyToOne(() => Asset, (asset) => asset.prices, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'assetId' })
  asset?: Asset;

  @Column()
  date!: Date;

  @Column('decimal', { precision: 20, scale: 8, transformer: numericTransformer })
  openPrice!: number;

  @Column('decimal', { precision: 20, scale: 8, transformer: numericTransformer })
  highPrice!: number;

  @Column('decimal', { precision: 20, scale: 8, transformer: numericTransformer })
  lowPrice!: number;

  @Column('decimal', { precision: 20, scale: 8, transformer: numericTransformer })
  closePrice!: number;

  @Column('bigint', { transformer: numericTransformer })
  volume!: number;
}
