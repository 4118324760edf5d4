import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './user.entity';
import { PricePrediction } from './price-prediction.entity';

@Entity('user_prediction_history')
@Index(['userId', 'viewedAt'])
export class UserPredictionHistory {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  userId!: string;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user?: User;

  @Column('uuid')
  predictionId!: string;

  @ManyToOne(() => PricePrediction, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'predictionId' })
  prediction?: PricePrediction;

  @CreateDateColumn()
  viewedAt!: Date;
}
