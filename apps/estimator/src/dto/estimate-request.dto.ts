import {
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { LOGISTICS_MODES } from '../config/logistics-multipliers.config';
import { LogisticsMode } from '../interfaces/price-estimate.interface';
import { IsNonNegativeNumberMap } from './is-non-negative-number-map.validator';

export class EstimateRequestDto {
  @IsString()
  @IsNotEmpty()
  location!: string;

  @IsIn(LOGISTICS_MODES)
  logisticsMode!: LogisticsMode;

  @IsOptional()
  @IsNumber()
  @Min(0.5)
  @Max(2.0)
  varietyGradeFactor?: number;

  @IsOptional()
  @IsNumber()
  @Min(-1)
  @Max(1)
  seasonIndex?: number;

  @IsOptional()
  @IsNumber()
  @Min(-1)
  @Max(1)
  shockIndex?: number;

  /** Current price per market, replacing the latest recorded price */
  @IsOptional()
  @IsNonNegativeNumberMap()
  overrides?: Record<string, number>;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  weatherOverride?: number;
}
