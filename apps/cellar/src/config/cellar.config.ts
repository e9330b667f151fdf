export const CELLAR_CONFIG = 'CELLAR_CONFIG';

export interface DatabaseConfig {
    host: string;
    port: number;
    username: string;
    password: string;
    database: string;
    synchronize: boolean;
    seedReferenceData: boolean;
}

export interface CellarConfig {
    host: string;
    port: number;
    database: DatabaseConfig;
    // abbreviation of the unit every tank capacity is expressed in
    canonicalVolumeUnit: string;
    lowCapacityPercent: number;
}

function toNumber(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new Error(`Invalid numeric configuration value: "${value}"`);
    }
    return parsed;
}

function toBoolean(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value.trim() === '') return fallback;
    return value.trim().toLowerCase() === 'true';
}

export function loadCellarConfig(env: NodeJS.ProcessEnv = process.env): CellarConfig {
    return {
        host: env.CELLAR_HOST ?? '0.0.0.0',
        port: toNumber(env.CELLAR_PORT, 3004),
        database: {
            host: env.DB_HOST ?? 'localhost',
            port: toNumber(env.DB_PORT, 5432),
            username: env.DB_USERNAME ?? 'postgres',
            password: env.DB_PASSWORD ?? '',
            database: env.DB_NAME ?? 'cellar',
            synchronize: toBoolean(env.DB_SYNCHRONIZE, false),
            seedReferenceData: toBoolean(env.DB_SEED_REFERENCE_DATA, false),
        },
        canonicalVolumeUnit: env.CELLAR_CANONICAL_VOLUME_UNIT ?? 'bbls',
        lowCapacityPercent: toNumber(env.CELLAR_LOW_CAPACITY_PERCENT, 20),
    };
}
