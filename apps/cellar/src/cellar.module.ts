import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CellarConfigModule } from './modules/cellar-config.module';
import { FermentationModule } from './modules/fermentation.module';
import { CELLAR_CONFIG, CellarConfig } from './config/cellar.config';
import { Unit } from './entities/unit.entity';
import { TransactionType } from './entities/transaction-type.entity';
import { Tank } from './entities/tank.entity';
import { Batch } from './entities/batch.entity';
import { BatchTransaction } from './entities/batch-transaction.entity';

@Module({
  imports: [
    CellarConfigModule,
    TypeOrmModule.forRootAsync({
      imports: [CellarConfigModule],
      inject: [CELLAR_CONFIG],
      useFactory: (config: CellarConfig) => ({
        type: 'postgres',
        host: config.database.host,
        port: config.database.port,
        username: config.database.username,
        password: config.database.password,
        database: config.database.database,
        entities: [Unit, TransactionType, Tank, Batch, BatchTransaction],
        synchronize: config.database.synchronize,
      }),
    }),
    FermentationModule,
  ],
})
export class CellarModule {}
