import { Unit } from '../entities/unit.entity';

export abstract class IUnitRepository {
  abstract findByName(name: string): Promise<Unit | null>;
  abstract findByAbbreviation(abbreviation: string): Promise<Unit | null>;
  abstract findByVolumeFlag(isVolume: boolean): Promise<Unit[]>;
  abstract save(unit: Unit): Promise<Unit>;
}
