import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  Matches,
  Min,
} from 'class-validator';
import { Currency } from '../../subscription/entities/subscription-type.entity';

const RESOURCE_QUANTITY = /^\d+(\.\d+)?([KMG]i?)?$/;

export class SubscriptionTypeState {
  @IsString()
  @Length(1, 100)
  name!: string;

  @IsString()
  @Length(1, 50)
  type!: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  amount!: number;

  @IsOptional()
  @IsEnum(Currency)
  currency?: Currency;

  @IsInt()
  @Min(1)
  durationDays!: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  maxContainers?: number;

  @IsOptional()
  @Matches(RESOURCE_QUANTITY)
  cpuLimitPerContainer?: string;

  @IsOptional()
  @Matches(RESOURCE_QUANTITY)
  memoryLimitPerContainer?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class ImageState {
  @IsString()
  @Length(1, 255)
  name!: string;

  @IsString()
  @Length(1, 500)
  image!: string;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}
