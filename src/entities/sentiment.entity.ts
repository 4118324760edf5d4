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
import { Asset } from './asset.entity';

@Entity('sentiments')
@Index(['assetId', 'analysisDate'])
@Check(`"sentimentScore" >= 0 AND "sentimentScore" <= 1`)
export class Sentiment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  assetId!: string;

  @ManyToOne(() => Asset, (asset) => asset.sentiments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'assetId' })
  asset?: Asset;

  @Column('float')
  sentimentScore!: number;

  @Column()
  analysisDate!: Date;

  @Column({ type: 'varchar', length: 50 })
  sourceType!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
