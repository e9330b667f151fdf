import { TankResponseDto } from './tank-response.dto';
import { BatchResponseDto } from './batch-response.dto';
import { TransactionResponseDto } from './transaction-response.dto';

export class TankDetailsResponseDto {
  tank!: TankResponseDto;
  batch!: BatchResponseDto | null;
  transactions!: TransactionResponseDto[];
}
