import { IsDateString, IsInt, IsNumber, Min } from 'class-validator';

/** One daily OHLCV bar; `date` is truncated to its UTC day. */
export class RecordPriceDto {
  @IsDateString()
  date!: string;

  @IsNumber()
  @Min(0)
  openPrice!: number;

  @IsNumber()
  @Min(0)
  highPrice!: number;

  @IsNumber()
  @Min(0)
  lowPrice!: number;

  @IsNumber()
  @Min(0)
  closePrice!: number;

  @IsInt()
  @Min(0)
  volume!: number;
}
