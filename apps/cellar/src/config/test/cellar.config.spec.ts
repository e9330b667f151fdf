import { loadCellarConfig } from '../cellar.config';

describe('loadCellarConfig', () => {
  it('should fall back to the defaults', () => {
    expect(loadCellarConfig({})).toEqual({
      host: '0.0.0.0',
      port: 3004,
      database: {
        host: 'localhost',
        port: 5432,
        username: 'postgres',
        password: '',
        database: 'cellar',
        synchronize: false,
        seedReferenceData: false,
      },
      canonicalVolumeUnit: 'bbls',
      lowCapacityPercent: 20,
    });
  });

  it('should read the environment', () => {
    const config = loadCellarConfig({
      CELLAR_PORT: '4100',
      DB_PASSWORD: 'test-secret',
      DB_SEED_REFERENCE_DATA: 'TRUE',
      CELLAR_CANONICAL_VOLUME_UNIT: 'gal',
      CELLAR_LOW_CAPACITY_PERCENT: '12.5',
    });

    expect(config.port).toBe(4100);
    expect(config.database.password).toBe('test-secret');
    expect(config.database.seedReferenceData).toBe(true);
    expect(config.canonicalVolumeUnit).toBe('gal');
    expect(config.lowCapacityPercent).toBe(12.5);
  });

  it('should throw on a non numeric port', () => {
    expect(() => loadCellarConfig({ CELLAR_PORT: 'abc' })).toThrow('Invalid numeric configuration value: "abc"');
  });
});
