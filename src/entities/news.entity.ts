import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Asset } from './asset.entity';

@Entity('news')
@Index(['title', 'source'], { unique: true })
@Index(['publishedAt'])
export class News {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid', nullable: true })
  assetId!: string | null;

  @ManyToOne(() => Asset, (asset) => asset.news, {
    nullable: true,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'assetId' })
  asset?: Asset | null;

  @Column({ type: 'varchar', length: 200 })
  title!: string;

  @Column('text')
  content!: string;

  @Column({ type: 'varchar', length: 500 })
  source!: string;

  @Column()
  publishedAt!: Date;

  @CreateDateColumn()
  createdAt!: Date;
}
