import { BatchTransaction } from '../entities/batch-transaction.entity';
import { TransactionResponseDto } from '../dtos/transaction-response.dto';
import { TransferResultDto } from '../dtos/transfer-result.dto';
import { TransferResult } from '../services/transfer.service';
import { formatQuantity } from '../common/quantity';

export class TransactionMapper {
  static toResponse(transaction: BatchTransaction): TransactionResponseDto {
    return {
      id: transaction.id,
      batchId: transaction.batchId,
      transactionTypeId: transaction.transactionTypeId,
      quantity: formatQuantity(transaction.quantity),
      unitId: transaction.unitId,
      occurredAt: transaction.occurredAt,
      actorId: transaction.actorId,
      note: transaction.note,
      relatedTankId: transaction.relatedTankId,
      createdAt: transaction.createdAt,
    };
  }

  static toTransferResponse(result: TransferResult): TransferResultDto {
    return {
      outgoing: TransactionMapper.toResponse(result.outgoing),
      incoming: TransactionMapper.toResponse(result.incoming),
    };
  }
}
