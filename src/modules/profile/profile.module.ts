import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UserPredictionHistory } from '../../entities/user-prediction-history.entity';
import { UserProfile } from '../../entities/user-profile.entity';
import { AssetsModule } from '../assets/assets.module';
import { AuthModule } from '../auth/auth.module';
import { NewsModule } from '../news/news.module';
import { PredictionsModule } from '../predictions/predictions.module';
import { ProfileController } from './profile.controller';
import { ProfileService } from './profile.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([UserProfile, UserPredictionHistory]),
    AssetsModule,
    AuthModule,
    NewsModule,
    PredictionsModule,
  ],
  controllers: [ProfileController],
  providers: [ProfileService],
  exports: [ProfileService],
})
export class ProfileModule {}
