import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  OneToOne,
  JoinColumn,
  ManyToMany,
  JoinTable,
} from 'typeorm';
import { User } from './user.entity';
import { Asset } from './asset.entity';

export const FAVORITES_TABLE = 'user_favorite_assets';

export enum SubscriptionPlan {
  FREE = 'free',
  PREMIUM = 'premium',
}

@Entity('user_profiles')
export class UserProfile {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  userId!: string;

  @OneToOne(() => User, (user) => user.profile, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user?: User;

  @Column({
    type: 'simple-enum',
    enum: SubscriptionPlan,
    default: SubscriptionPlan.FREE,
  })
  subscriptionPlan!: SubscriptionPlan;

  // The (profile, asset) pair is the join table's primary key.
  @ManyToMany(() => Asset, (asset) => asset.fans)
  @JoinTable({
    name: FAVORITES_TABLE,
    joinColumn: { name: 'profileId', referencedColumnName: 'id' },
    inverseJoinColumn: { name: 'assetId', referencedColumnName: 'id' },
  })
  favoriteAssets?: Asset[];

  @CreateDateColumn()
  createdAt!: Date;
}
