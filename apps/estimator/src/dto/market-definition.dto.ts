import { IsLatitude, IsLongitude, IsNotEmpty, IsString } from 'class-validator';
import { MarketDefinition } from '../interfaces/market.interface';
import { IsNonNegativeNumberMap } from './is-non-negative-number-map.validator';

export class MarketDefinitionDto implements MarketDefinition {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  county!: string;

  @IsLatitude()
  lat!: number;

  @IsLongitude()
  lon!: number;

  @IsNonNegativeNumberMap()
  frictionMap!: Record<string, number>;
}
