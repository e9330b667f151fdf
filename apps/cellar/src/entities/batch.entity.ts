import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index, ManyToOne, JoinColumn, OneToMany } from 'typeorm';
import { Tank } from './tank.entity';
import { BatchTransaction } from './batch-transaction.entity';

@Entity('batches')
export class Batch {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Index()
    @Column({ type: 'uuid' })
    tankId!: string;

    @ManyToOne(() => Tank)
    @JoinColumn({ name: 'tankId' })
    tank?: Tank;

    @Column({ type: 'varchar', length: 100 })
    name!: string;

    @Column({ type: 'timestamptz' })
    startedAt!: Date;

    @Column({ type: 'timestamptz', nullable: true, default: null })
    yeastAddedAt!: Date | null;

    @Column({ type: 'timestamptz', nullable: true, default: null })
    stabilizerAddedAt!: Date | null;

    // null while the batch is active
    @Index()
    @Column({ type: 'timestamptz', nullable: true, default: null })
    completedAt!: Date | null;

    @CreateDateColumn({ type: 'timestamptz' })
    createdAt!: Date;

    @OneToMany(() => BatchTransaction, (transaction) => transaction.batch)
    transactions?: BatchTransaction[];
}
