export class BatchResponseDto {
  id!: string;
  tankId!: string;
  name!: string;
  active!: boolean;
  startedAt!: Date;
  yeastAddedAt!: Date | null;
  stabilizerAddedAt!: Date | null;
  completedAt!: Date | null;
  // whole days, up to completion or now
  daysInFermentation!: number;
}
