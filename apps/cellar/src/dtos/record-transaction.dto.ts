import { IsDateString, IsInt, IsOptional, IsString, IsUUID, Matches, MaxLength, Min } from 'class-validator';
import { QUANTITY_FORMAT_MESSAGE, QUANTITY_PATTERN } from '../common/quantity';

export class RecordTransactionDto {
  @IsUUID()
  batchId!: string;

  @IsInt()
  @Min(1)
  transactionTypeId!: number;

  @IsString()
  @Matches(QUANTITY_PATTERN, { message: `quantity ${QUANTITY_FORMAT_MESSAGE}` })
  quantity!: string;

  @IsOptional()
  @IsDateString()
  occurredAt?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  actorId?: string;

  @IsOptional()
  @IsString()
  note?: string;
}
