import { IsEnum, IsNumber, IsOptional, IsString, Length, Matches, Min } from 'class-validator';
import { AssetType } from '../../../entities/asset.entity';

export class CreateAssetDto {
  @IsString()
  @Length(1, 10)
  @Matches(/^[A-Za-z0-9.-]+$/, { message: 'ticker may only contain letters, digits, dots and dashes' })
  ticker!: string;

  @IsString()
  @Length(1, 100)
  name!: string;

  @IsEnum(AssetType)
  assetType!: AssetType;

  @IsOptional()
  @IsNumber()
  @Min(0)
  marketCap?: number;
}
