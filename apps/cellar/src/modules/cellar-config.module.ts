import { Global, Module } from '@nestjs/common';
import { CELLAR_CONFIG, loadCellarConfig } from '../config/cellar.config';

@Global()
@Module({
  providers: [
    {
      provide: CELLAR_CONFIG,
      useFactory: () => loadCellarConfig(),
    },
  ],
  exports: [CELLAR_CONFIG],
})
export class CellarConfigModule {}
