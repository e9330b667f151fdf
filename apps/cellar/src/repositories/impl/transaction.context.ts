import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import { DataSource, EntityManager } from 'typeorm';
import { translateStorageError } from '../../errors/storage-errors';

/**
 * Holds the entity manager of the unit of work currently open for this call
 * chain. Repositories read and write through it, so a service method that
 * opens a transaction and every service it calls share one commit.
 */
@Injectable()
export class TransactionContext {
    private readonly storage = new AsyncLocalStorage<EntityManager>();

    constructor(private readonly dataSource: DataSource) {}

    get manager(): EntityManager | undefined {
        return this.storage.getStore();
    }

    // joins the open unit of work, or opens one
    async run<T>(callback: () => Promise<T>): Promise<T> {
        if (this.storage.getStore()) {
            return await callback();
        }

        try {
            return await this.dataSource.transaction((manager) => this.storage.run(manager, callback));
        } catch (error) {
            throw translateStorageError(error);
        }
    }
}
