import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index, ManyToOne, JoinColumn, Check } from 'typeorm';
import { TankStatus } from '../enums/tank-status.enum';
import { Unit } from './unit.entity';

@Entity('tanks')
@Check(`"currentQuantity" >= 0 AND "currentQuantity" <= "capacity"`)
export class Tank {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Index({ unique: true })
    @Column({ type: 'varchar', length: 100 })
    label!: string;

    // decimals come back from postgres as strings, keep them that way
    @Column({ type: 'decimal', precision: 14, scale: 4 })
    capacity!: string;

    @Column({ type: 'decimal', precision: 14, scale: 4, default: 0 })
    currentQuantity!: string;

    @Column({ type: 'int' })
    capacityUnitId!: number;

    @ManyToOne(() => Unit)
    @JoinColumn({ name: 'capacityUnitId' })
    capacityUnit?: Unit;

    @Index()
    @Column({ type: 'uuid', nullable: true })
    currentBatchId!: string | null;

    @Column({ type: 'enum', enum: TankStatus, default: TankStatus.ACTIVE })
    status!: TankStatus;

    @CreateDateColumn({ type: 'timestamptz' })
    createdAt!: Date;

    @Column({ type: 'timestamptz', nullable: true, default: null })
    deletedAt!: Date | null;
}
