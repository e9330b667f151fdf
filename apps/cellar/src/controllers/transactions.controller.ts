import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { createUuidPipe } from '../common/validation';
import { LedgerService } from '../services/ledger.service';
import { TransactionType } from '../entities/transaction-type.entity';
import { RecordTransactionDto } from '../dtos/record-transaction.dto';
import { BatchTransactionsFilterDto } from '../dtos/batch-transactions-filter.dto';
import { TransactionResponseDto } from '../dtos/transaction-response.dto';
import { TransactionMapper } from '../mappers/transactions.mappers';

@Controller()
export class TransactionsController {
  constructor(private readonly ledgerService: LedgerService) {}

  @MessagePattern({ cmd: 'record_transaction' })
  async recordTransaction(@Payload() dto: RecordTransactionDto): Promise<TransactionResponseDto> {
    const transaction = await this.ledgerService.record({
      batchId: dto.batchId,
      transactionTypeId: dto.transactionTypeId,
      quantity: dto.quantity,
      occurredAt: dto.occurredAt ? new Date(dto.occurredAt) : undefined,
      actorId: dto.actorId,
      note: dto.note,
    });
    return TransactionMapper.toResponse(transaction);
  }

  @MessagePattern({ cmd: 'list_batch_transactions' })
  async listBatchTransactions(@Payload(createUuidPipe()) batchId: string): Promise<TransactionResponseDto[]> {
    const transactions = await this.ledgerService.listByBatch(batchId);
    return transactions.map((transaction) => TransactionMapper.toResponse(transaction));
  }

  @MessagePattern({ cmd: 'list_batch_transactions_by_type' })
  async listBatchTransactionsByType(@Payload() filter: BatchTransactionsFilterDto): Promise<TransactionResponseDto[]> {
    const { batchId, transactionTypeId } = filter;
    const transactions = transactionTypeId === undefined
      ? await this.ledgerService.listByBatch(batchId)
      : await this.ledgerService.listByBatchAndType(batchId, transactionTypeId);
    return transactions.map((transaction) => TransactionMapper.toResponse(transaction));
  }

  @MessagePattern({ cmd: 'list_transaction_types' })
  listTransactionTypes(): Readonly<TransactionType>[] {
    return this.ledgerService.listTypes();
  }
}
