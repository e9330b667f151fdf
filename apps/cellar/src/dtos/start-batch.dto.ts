import { IsDateString, IsInt, IsNotEmpty, IsOptional, IsString, IsUUID, Matches, MaxLength, Min } from 'class-validator';
import { QUANTITY_FORMAT_MESSAGE, QUANTITY_PATTERN } from '../common/quantity';

export class StartBatchDto {
  @IsUUID()
  tankId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  batchName!: string;

  // opening fill, usually Transfer In
  @IsInt()
  @Min(1)
  transactionTypeId!: number;

  @IsString()
  @Matches(QUANTITY_PATTERN, { message: `initialQuantity ${QUANTITY_FORMAT_MESSAGE}` })
  initialQuantity!: string;

  @IsOptional()
  @IsString()
  note?: string;

  // Ej: "2026-01-29T10:00:00.000Z", defaults to now
  @IsOptional()
  @IsDateString()
  startedAt?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  actorId?: string;
}
