/**
 * Weather Archive - Environment Configuration
 */

export const DEFAULT_PORT = 3000;

export interface ArchiveConfig {
    /** JSON document loaded by the HTTP server at start-up */
    dataFile?: string;
    port: number;
    /** Fixed seed for historical sampling; unset means a fresh draw per request */
    sampleSeed?: string;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string): string | undefined {
    const value = env[name];
    if (value && value.trim().length > 0) {
        return value.trim();
    }
    return undefined;
}

function getPort(env: Env): number {
    const raw = getEnvVar(env, 'PORT');
    if (!raw) return DEFAULT_PORT;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 && parsed < 65_536 ? parsed : DEFAULT_PORT;
}

export function loadConfig(env: Env = process.env): ArchiveConfig {
    return {
        dataFile: getEnvVar(env, 'WEATHER_DATA_FILE'),
        port: getPort(env),
        sampleSeed: getEnvVar(env, 'WEATHER_SAMPLE_SEED')
    };
}
