import { IsEnum } from 'class-validator';
import { SubscriptionPlan } from '../../../entities/user-profile.entity';

export class SetPlanDto {
  @IsEnum(SubscriptionPlan)
  plan!: SubscriptionPlan;
}
