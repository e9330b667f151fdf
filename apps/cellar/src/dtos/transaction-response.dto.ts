export class TransactionResponseDto {
  id!: string;
  batchId!: string;
  transactionTypeId!: number;
  quantity!: string;
  unitId!: number;
  occurredAt!: Date;
  actorId!: string | null;
  note!: string | null;
  relatedTankId!: string | null;
  createdAt!: Date;
}
