// src/config.ts
// Engine configuration, read once from the environment.
//
// Fee and reserve figures never come from here: they travel in each PoolState
// so quotes against different pools cannot interfere.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface EngineConfig {
    readonly logLevel: LogLevel;
    readonly latencySampleLimit: number;
}

export const DEFAULT_LATENCY_SAMPLES = 10_000;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(l => l === value);
}

export function readEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const rawLevel = env.LOG_LEVEL?.toLowerCase();
    let logLevel: LogLevel = 'info';
    if (rawLevel !== undefined && isLogLevel(rawLevel)) {
        logLevel = rawLevel;
    } else if (env.DEBUG === '1') {
        logLevel = 'debug';
    }

    const rawSamples = Number(env.QUOTE_LATENCY_SAMPLES);
    const latencySampleLimit = Number.isInteger(rawSamples) && rawSamples > 0
        ? rawSamples
        : DEFAULT_LATENCY_SAMPLES;

    return Object.freeze({ logLevel, latencySampleLimit });
}

export function shouldLog(configured: LogLevel, level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(configured);
}
