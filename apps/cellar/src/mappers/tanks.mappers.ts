import { Tank } from '../entities/tank.entity';
import { TankResponseDto } from '../dtos/tank-response.dto';
import { TankDetailsResponseDto } from '../dtos/tank-details-response.dto';
import { TankDetails, isLowCapacity } from '../services/tank.service';
import { formatQuantity, percentOf } from '../common/quantity';
import { BatchMapper } from './batches.mappers';
import { TransactionMapper } from './transactions.mappers';

export class TankMapper {
  static toResponse(tank: Tank, lowCapacityPercent: number): TankResponseDto {
    return {
      id: tank.id,
      label: tank.label,
      capacity: formatQuantity(tank.capacity),
      currentQuantity: formatQuantity(tank.currentQuantity),
      capacityUnitId: tank.capacityUnitId,
      currentBatchId: tank.currentBatchId,
      status: tank.status,
      percentFull: percentOf(tank.currentQuantity, tank.capacity),
      isLowCapacity: tank.currentBatchId !== null && isLowCapacity(tank, lowCapacityPercent),
      createdAt: tank.createdAt,
      deletedAt: tank.deletedAt,
    };
  }

  static toDetailsResponse(details: TankDetails, lowCapacityPercent: number): TankDetailsResponseDto {
    return {
      tank: TankMapper.toResponse(details.tank, lowCapacityPercent),
      batch: details.batch ? BatchMapper.toResponse(details.batch) : null,
      transactions: details.transactions.map((transaction) => TransactionMapper.toResponse(transaction)),
    };
  }
}
