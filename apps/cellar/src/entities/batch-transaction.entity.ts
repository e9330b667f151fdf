import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index, ManyToOne, JoinColumn } from 'typeorm';
import { Batch } from './batch.entity';
import { TransactionType } from './transaction-type.entity';

// append only, never updated or deleted
@Entity('batch_transactions')
@Index(['batchId', 'occurredAt'])
export class BatchTransaction {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ type: 'uuid' })
    batchId!: string;

    @ManyToOne(() => Batch, (batch) => batch.transactions, { onDelete: 'RESTRICT' })
    @JoinColumn({ name: 'batchId' })
    batch?: Batch;

    @Index()
    @Column({ type: 'int' })
    transactionTypeId!: number;

    @ManyToOne(() => TransactionType)
    @JoinColumn({ name: 'transactionTypeId' })
    transactionType?: TransactionType;

    @Column({ type: 'decimal', precision: 14, scale: 4 })
    quantity!: string;

    @Column({ type: 'int' })
    unitId!: number;

    @Column({ type: 'timestamptz' })
    occurredAt!: Date;

    @Column({ type: 'varchar', length: 100, nullable: true })
    actorId!: string | null;

    @Column({ type: 'text', nullable: true })
    note!: string | null;

    // the other tank of a transfer
    @Column({ type: 'uuid', nullable: true })
    relatedTankId!: string | null;

    @CreateDateColumn({ type: 'timestamptz' })
    createdAt!: Date;
}
