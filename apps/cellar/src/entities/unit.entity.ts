import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm';

@Entity('units')
export class Unit {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ type: 'varchar', length: 50, unique: true })
    name!: string;

    @Column({ type: 'varchar', length: 10 })
    abbreviation!: string;

    // volume units (barrels, gallons) vs weight units (grams, pounds)
    @Column({ type: 'boolean', default: true })
    isVolume!: boolean;
}
