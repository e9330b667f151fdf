import { TransactionType } from '../entities/transaction-type.entity';
import { ITransactionTypeRepository } from '../repositories/itransactiontype.repository';
import { TransactionSystemRole } from '../enums/transaction-system-role.enum';
import { ValidationError } from '../errors/cellar.exception';
import { CellarRule } from '../enums/cellar-rule.enum';

/**
 * In-memory copy of the transaction type table, read once at startup.
 *
 * Frozen after construction and shared by every request. Built from an empty
 * table it is empty, and every lookup reports an invalid transaction type.
 */
export class TransactionTypeCatalog {
    private readonly byId: ReadonlyMap<number, Readonly<TransactionType>>;

    private constructor(types: TransactionType[]) {
        const entries = types.map((type): [number, Readonly<TransactionType>] => [type.id, Object.freeze({ ...type })]);
        this.byId = new Map(entries);
        Object.freeze(this);
    }

    static async load(repository: ITransactionTypeRepository): Promise<TransactionTypeCatalog> {
        const types = await repository.findAll();
        return new TransactionTypeCatalog(types);
    }

    static of(types: TransactionType[]): TransactionTypeCatalog {
        return new TransactionTypeCatalog(types);
    }

    get size(): number {
        return this.byId.size;
    }

    get(transactionTypeId: number): Readonly<TransactionType> | undefined {
        return this.byId.get(transactionTypeId);
    }

    require(transactionTypeId: number): Readonly<TransactionType> {
        const type = this.byId.get(transactionTypeId);
        if (!type) {
            throw new ValidationError(
                CellarRule.INVALID_TRANSACTION_TYPE,
                `Invalid transaction type: ${transactionTypeId}`,
                { transactionTypeId },
            );
        }
        return type;
    }

    findByName(name: string): Readonly<TransactionType> | undefined {
        return this.list().find((type) => type.name === name);
    }

    // the type the service uses for the events it generates itself
    bySystemRole(role: TransactionSystemRole): Readonly<TransactionType> {
        const type = this.list().find((candidate) => candidate.systemRole === role);
        if (!type) {
            throw new ValidationError(
                CellarRule.INVALID_TRANSACTION_TYPE,
                `No transaction type is configured for ${role}`,
                { systemRole: role },
            );
        }
        return type;
    }

    list(): Readonly<TransactionType>[] {
        return [...this.byId.values()];
    }
}
