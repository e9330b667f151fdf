import { TransactionResponseDto } from './transaction-response.dto';

export class TransferResultDto {
  outgoing!: TransactionResponseDto;
  incoming!: TransactionResponseDto;
}
