import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Unit } from '../entities/unit.entity';
import { TransactionType } from '../entities/transaction-type.entity';
import { Tank } from '../entities/tank.entity';
import { Batch } from '../entities/batch.entity';
import { BatchTransaction } from '../entities/batch-transaction.entity';
import { TanksController } from '../controllers/tanks.controller';
import { BatchController } from '../controllers/batch.controller';
import { TransactionsController } from '../controllers/transactions.controller';
import { TransferController } from '../controllers/transfer.controller';
import { TankService } from '../services/tank.service';
import { BatchService } from '../services/batch.service';
import { LedgerService } from '../services/ledger.service';
import { TransferService } from '../services/transfer.service';
import { ReferenceDataSeeder } from '../services/reference-data.seeder';
import { TransactionTypeCatalog } from '../services/transaction-type.catalog';
import { ITankRepository } from '../repositories/itank.repository';
import { IBatchRepository } from '../repositories/ibatch.repository';
import { IBatchTransactionRepository } from '../repositories/ibatchtransaction.repository';
import { ITransactionTypeRepository } from '../repositories/itransactiontype.repository';
import { IUnitRepository } from '../repositories/iunit.repository';
import { TankRepository } from '../repositories/impl/tank.repository';
import { BatchRepository } from '../repositories/impl/batch.repository';
import { BatchTransactionRepository } from '../repositories/impl/batchtransaction.repository';
import { TransactionTypeRepository } from '../repositories/impl/transactiontype.repository';
import { UnitRepository } from '../repositories/impl/unit.repository';
import { TransactionContext } from '../repositories/impl/transaction.context';
import { CELLAR_CONFIG, CellarConfig } from '../config/cellar.config';

@Module({
  imports: [
    TypeOrmModule.forFeature([Unit, TransactionType, Tank, Batch, BatchTransaction]),
  ],
  controllers: [TanksController, BatchController, TransactionsController, TransferController],
  providers: [
    TransactionContext,
    { provide: ITankRepository, useClass: TankRepository },
    { provide: IBatchRepository, useClass: BatchRepository },
    { provide: IBatchTransactionRepository, useClass: BatchTransactionRepository },
    { provide: ITransactionTypeRepository, useClass: TransactionTypeRepository },
    { provide: IUnitRepository, useClass: UnitRepository },
    ReferenceDataSeeder,
    {
      // loaded once, after the optional seeding and before any message is served
      provide: TransactionTypeCatalog,
      inject: [ReferenceDataSeeder, ITransactionTypeRepository, CELLAR_CONFIG],
      useFactory: async (
        seeder: ReferenceDataSeeder,
        repository: ITransactionTypeRepository,
        config: CellarConfig,
      ): Promise<TransactionTypeCatalog> => {
        if (config.database.seedReferenceData) {
          await seeder.seed();
        }
        return await TransactionTypeCatalog.load(repository);
      },
    },
    TankService,
    LedgerService,
    BatchService,
    TransferService,
  ],
  exports: [TankService, BatchService, LedgerService, TransferService],
})
export class FermentationModule {}
