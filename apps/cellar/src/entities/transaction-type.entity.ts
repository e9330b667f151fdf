import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Check } from 'typeorm';
import { Unit } from './unit.entity';
import { BatchMilestone } from '../enums/batch-milestone.enum';
import { MilestonePolicy } from '../enums/milestone-policy.enum';
import { TransactionSystemRole } from '../enums/transaction-system-role.enum';

@Entity('transaction_types')
@Check(`"quantityMultiplier" IN (-1, 0, 1)`)
export class TransactionType {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: 'varchar', length: 50, unique: true })
    name!: string;

    @Column({ type: 'varchar', length: 255, nullable: true })
    description!: string | null;

    @Column({ type: 'int' })
    unitId!: number;

    @ManyToOne(() => Unit)
    @JoinColumn({ name: 'unitId' })
    unit?: Unit;

    @Column({ type: 'boolean', default: true })
    affectsTankQuantity!: boolean;

    // +1 additions, -1 removals, 0 notes and readings
    @Column({ type: 'smallint', default: 0 })
    quantityMultiplier!: number;

    @Column({ type: 'enum', enum: TransactionSystemRole, nullable: true, unique: true })
    systemRole!: TransactionSystemRole | null;

    @Column({ type: 'enum', enum: BatchMilestone, nullable: true })
    milestone!: BatchMilestone | null;

    @Column({ type: 'enum', enum: MilestonePolicy, default: MilestonePolicy.FIRST_OCCURRENCE })
    milestonePolicy!: MilestonePolicy;
}
