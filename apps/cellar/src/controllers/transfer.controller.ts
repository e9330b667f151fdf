import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { TransferService } from '../services/transfer.service';
import { TransferBatchDto } from '../dtos/transfer-batch.dto';
import { TransferResultDto } from '../dtos/transfer-result.dto';
import { TransactionMapper } from '../mappers/transactions.mappers';

@Controller()
export class TransferController {
  constructor(private readonly transferService: TransferService) {}

  @MessagePattern({ cmd: 'transfer_batch' })
  async transferBatch(@Payload() dto: TransferBatchDto): Promise<TransferResultDto> {
    const result = await this.transferService.transfer(dto);
    return TransactionMapper.toTransferResponse(result);
  }
}
