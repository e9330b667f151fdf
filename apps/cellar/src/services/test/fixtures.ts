import { TransactionType } from '../../entities/transaction-type.entity';
import { Tank } from '../../entities/tank.entity';
import { Batch } from '../../entities/batch.entity';
import { TankStatus } from '../../enums/tank-status.enum';
import { MilestonePolicy } from '../../enums/milestone-policy.enum';
import { TransactionSystemRole } from '../../enums/transaction-system-role.enum';
import { BatchMilestone } from '../../enums/batch-milestone.enum';

export function makeType(overrides: Partial<TransactionType>): TransactionType {
    return Object.assign(new TransactionType(), {
        id: 1,
        name: 'Transfer In',
        description: null,
        unitId: 1,
        affectsTankQuantity: true,
        quantityMultiplier: 1,
        systemRole: null,
        milestone: null,
        milestonePolicy: MilestonePolicy.FIRST_OCCURRENCE,
        ...overrides,
    });
}

export function makeTank(overrides: Partial<Tank>): Tank {
    return Object.assign(new Tank(), {
        id: 'tank-1',
        label: 'FV-01',
        capacity: '100',
        currentQuantity: '0',
        capacityUnitId: 1,
        currentBatchId: null,
        status: TankStatus.ACTIVE,
        createdAt: new Date('2026-01-01T00:00:00.000Z'),
        deletedAt: null,
        ...overrides,
    });
}

export function makeBatch(overrides: Partial<Batch>): Batch {
    return Object.assign(new Batch(), {
        id: 'batch-1',
        tankId: 'tank-1',
        name: 'Chardonnay 2026',
        startedAt: new Date('2026-01-10T08:00:00.000Z'),
        yeastAddedAt: null,
        stabilizerAddedAt: null,
        completedAt: null,
        createdAt: new Date('2026-01-10T08:00:00.000Z'),
        ...overrides,
    });
}

// the types the service itself relies on
export const standardTypes = (): TransactionType[] => [
    makeType({ id: 1, name: 'Transfer In', quantityMultiplier: 1, systemRole: TransactionSystemRole.TRANSFER_IN }),
    makeType({ id: 2, name: 'Transfer Out', quantityMultiplier: -1, systemRole: TransactionSystemRole.TRANSFER_OUT }),
    makeType({ id: 3, name: 'Waste', quantityMultiplier: -1, systemRole: TransactionSystemRole.WASTE }),
    makeType({ id: 4, name: 'Sample', quantityMultiplier: -1 }),
    makeType({ id: 5, name: 'Yeast Addition', unitId: 4, affectsTankQuantity: false, quantityMultiplier: 0, milestone: BatchMilestone.YEAST }),
    makeType({
        id: 6,
        name: 'Lysozyme Addition',
        unitId: 4,
        affectsTankQuantity: false,
        quantityMultiplier: 0,
        milestone: BatchMilestone.STABILIZER,
        milestonePolicy: MilestonePolicy.ALWAYS_LATEST,
    }),
];
