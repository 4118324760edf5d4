import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
  Check,
} from 'typeorm';
import { numericTransformer } from '../utils/column-transformers';
import { Asset } from './asset.entity';

export enum PredictionHorizon {
  ONE_DAY = '1D',
  SEVEN_DAYS = '7D',
  THIRTY_DAYS = '30D',
}

export const HORIZON_DAYS: Record<PredictionHorizon, number> = {
  [PredictionHorizon.ONE_DAY]: 1,
  [PredictionHorizon.SEVEN_DAYS]: 7,
  [PredictionHorizon.THIRTY_DAYS]: 30,
};

export const PREDICTION_HORIZONS = Object.values(PredictionHorizon);

@Entity('price_predictions')
@Index(['assetId', 'horizon', 'runDate'], { unique: true })
@Index(['predictionDate'])
@Check(`"confidence" >= 0 AND "confidence" <= 1`)
export class PricePrediction {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  assetId!: string;

  @ManyToOne(() => Asset, (asset) => asset.predictions, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'assetId' })
  asset?: Asset;

  @Column({ type: 'simple-enum', enum: PredictionHorizon })
  horizon!: PredictionHorizon;

  /** The moment the predicted price refers to. */
  @Column()
  predictionDate!: Date;

  /** UTC day (YYYY-MM-DD) of the run that produced the row. */
  @Column({ type: 'varchar', length: 10 })
  runDate!: string;

  @Column('decimal', { precision: 20, scale: 8, transformer: numericTransformer })
  predictedPrice!: number;

  @Column('float')
  confidence!: number;

  @Column({ type: 'varchar', length: 50 })
  modelVersion!: string;

  @Column('text', { nullable: true })
  commentary!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
