import { IsDateString, IsOptional } from 'class-validator';

export class PriceHistoryQueryDto {
  @IsOptional()
  @IsDateString()
  from?: string;

  @IsOptional()
  @IsDateString()
  to?: string;
}
