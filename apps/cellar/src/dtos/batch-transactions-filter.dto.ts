import { IsInt, IsOptional, IsUUID, Min } from 'class-validator';

export class BatchTransactionsFilterDto {
  @IsUUID()
  batchId!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  transactionTypeId?: number;
}
