import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Asset } from '../../entities/asset.entity';
import { AssetStats } from '../../entities/asset-stats.entity';
import { UserProfile } from '../../entities/user-profile.entity';
import { AssetsModule } from '../assets/assets.module';
import { AuthModule } from '../auth/auth.module';
import { PredictionsModule } from '../predictions/predictions.module';
import { HomeController } from './home.controller';
import { HomeService } from './home.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Asset, AssetStats, UserProfile]),
    AssetsModule,
    AuthModule,
    PredictionsModule,
  ],
  controllers: [HomeController],
  providers: [HomeService],
})
export class HomeModule {}
