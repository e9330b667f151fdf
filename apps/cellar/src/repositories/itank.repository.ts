import { Tank } from '../entities/tank.entity';

export abstract class ITankRepository {
  // basic crud methods
  abstract create(tank: Tank): Promise<Tank>;
  abstract save(tank: Tank): Promise<Tank>;
  abstract findById(tankId: string): Promise<Tank | null>;
  abstract findByLabel(label: string): Promise<Tank | null>;
  abstract findByLabelIncludingDeleted(label: string): Promise<Tank | null>;
  abstract existsByLabel(label: string): Promise<boolean>;

  // row locked reads, only valid inside executeInTransaction
  abstract findByIdForUpdate(tankId: string): Promise<Tank | null>;

  // query methods
  abstract findAll(): Promise<Tank[]>;
  abstract findAllIncludingDeleted(): Promise<Tank[]>;
  abstract findDeleted(): Promise<Tank[]>;
  abstract findByOccupancy(occupied: boolean): Promise<Tank[]>;

  abstract executeInTransaction<T>(callback: () => Promise<T>): Promise<T>;
}
