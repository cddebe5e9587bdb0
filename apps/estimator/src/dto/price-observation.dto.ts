import { IsNotEmpty, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import { IsTimestamp } from './is-timestamp.validator';

export class PriceObservationDto {
  @IsString()
  @IsNotEmpty()
  market!: string;

  @IsNumber()
  @Min(0)
  price!: number;

  @IsTimestamp()
  observedAt!: string;

  @IsOptional()
  @IsString()
  source?: string;
}
