import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';
import { createUuidPipe } from '../common/validation';
import { BatchService } from '../services/batch.service';
import { StartBatchDto } from '../dtos/start-batch.dto';
import { BatchResponseDto } from '../dtos/batch-response.dto';
import { BatchMapper } from '../mappers/batches.mappers';

@Controller()
export class BatchController {
  constructor(private readonly batchService: BatchService) {}

  @MessagePattern({ cmd: 'start_batch' })
  async startBatch(@Payload() dto: StartBatchDto): Promise<BatchResponseDto> {
    const batch = await this.batchService.start({
      tankId: dto.tankId,
      batchName: dto.batchName,
      transactionTypeId: dto.transactionTypeId,
      initialQuantity: dto.initialQuantity,
      note: dto.note,
      startedAt: dto.startedAt ? new Date(dto.startedAt) : undefined,
      actorId: dto.actorId,
    });
    return BatchMapper.toResponse(batch);
  }

  @MessagePattern({ cmd: 'get_batch' })
  async getBatch(@Payload(createUuidPipe()) batchId: string): Promise<BatchResponseDto> {
    return BatchMapper.toResponse(await this.batchService.getById(batchId));
  }

  @MessagePattern({ cmd: 'list_active_batches' })
  async listActiveBatches(): Promise<BatchResponseDto[]> {
    const batches = await this.batchService.listActive();
    return batches.map((batch) => BatchMapper.toResponse(batch));
  }

  @MessagePattern({ cmd: 'list_completed_batches' })
  async listCompletedBatches(): Promise<BatchResponseDto[]> {
    const batches = await this.batchService.listCompleted();
    return batches.map((batch) => BatchMapper.toResponse(batch));
  }

  @MessagePattern({ cmd: 'complete_batch' })
  async completeBatch(@Payload(createUuidPipe()) batchId: string): Promise<BatchResponseDto> {
    return BatchMapper.toResponse(await this.batchService.complete(batchId));
  }
}
