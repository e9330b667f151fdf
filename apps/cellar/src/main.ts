import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { CellarModule } from './cellar.module';
import { CellarExceptionFilter } from './filters/cellar-exception.filter';
import { createValidationPipe } from './common/validation';
import { loadCellarConfig } from './config/cellar.config';

dotenv.config();

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const { host, port } = loadCellarConfig();

  const app = await NestFactory.createMicroservice<MicroserviceOptions>(CellarModule, {
    transport: Transport.TCP,
    options: { host, port },
  });

  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new CellarExceptionFilter());

  await app.listen();
  logger.log(`Cellar microservice listening on ${host}:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Cellar microservice failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
