import { IsNumber, IsOptional, Max, Min } from 'class-validator';

export class LowCapacityFilterDto {
  // percent, defaults to CELLAR_LOW_CAPACITY_PERCENT
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(100)
  thresholdPercent?: number;
}
