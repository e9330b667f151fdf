import { TankStatus } from '../enums/tank-status.enum';

export class TankResponseDto {
  id!: string;
  label!: string;
  capacity!: string;
  currentQuantity!: string;
  capacityUnitId!: number;
  currentBatchId!: string | null;
  status!: TankStatus;
  // 0.00 to 100.00
  percentFull!: string;
  isLowCapacity!: boolean;
  createdAt!: Date;
  deletedAt!: Date | null;
}
