import { IsNotEmpty, IsOptional, IsString, IsUUID, MaxLength } from 'class-validator';

export class TransferBatchDto {
  @IsUUID()
  sourceBatchId!: string;

  @IsString()
  @IsNotEmpty()
  destinationTankLabel!: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  actorId?: string;

  @IsOptional()
  @IsString()
  note?: string;
}
