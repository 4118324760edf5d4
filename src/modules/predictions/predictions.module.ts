import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnvConfig } from '../../config/env.validation';
import { Asset } from '../../entities/asset.entity';
import { HistoricalPrice } from '../../entities/historical-price.entity';
import { PricePrediction } from '../../entities/price-prediction.entity';
import { UserPredictionHistory } from '../../entities/user-prediction-history.entity';
import { UserProfile } from '../../entities/user-profile.entity';
import { AiModule } from '../ai/ai.module';
import { AuthModule } from '../auth/auth.module';
import { MarketDataModule } from '../market-data/market-data.module';
import { LinearTrendPredictor } from './predictors/linear-trend.predictor';
import { PRICE_PREDICTOR, PricePredictor } from './predictors/price-predictor';
import { RandomWalkPredictor } from './predictors/random-walk.predictor';
import { PredictionsController } from './predictions.controller';
import { PredictionsService } from './predictions.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      Asset,
      HistoricalPrice,
      PricePrediction,
      UserPredictionHistory,
      UserProfile,
    ]),
    AiModule,
    AuthModule,
    MarketDataModule,
  ],
  controllers: [PredictionsController],
  providers: [
    PredictionsService,
    {
      provide: PRICE_PREDICTOR,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvConfig, true>): PricePredictor =>
        configService.get('PREDICTION_MODEL', { infer: true }) === 'trend'
          ? new LinearTrendPredictor()
          : new RandomWalkPredictor(),
    },
  ],
  exports: [PredictionsService],
})
export class PredictionsModule {}
