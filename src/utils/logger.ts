// src/utils/logger.ts
// Logger utility for the quote engine

import { readEngineConfig, shouldLog, type LogLevel } from '../config.js';

export interface QuoteLog {
    type: string;
    pool?: string;
    amountIn?: bigint;
    amountOut?: bigint;
    impactBps?: number;
    error?: string;
    reason?: string;
    [key: string]: unknown;
}

export function formatQuoteLog(log: QuoteLog): string {
    const parts: string[] = [`[${log.type}]`];

    if (log.pool) parts.push(log.pool);
    if (log.amountIn !== undefined) parts.push(`in=${log.amountIn}`);
    if (log.amountOut !== undefined) parts.push(`out=${log.amountOut}`);
    if (log.impactBps !== undefined) parts.push(`impact=${log.impactBps}bps`);
    if (log.error) parts.push(`error=${log.error}`);
    if (log.reason) parts.push(`reason=${log.reason}`);

    return parts.join(" | ");
}

let level: LogLevel = readEngineConfig().logLevel;

export function setLogLevel(next: LogLevel): void {
    level = next;
}

export const logger = {
    info: (...args: unknown[]) => {
        if (shouldLog(level, "info")) console.log("[INFO]", ...args);
    },
    warn: (...args: unknown[]) => {
        if (shouldLog(level, "warn")) console.warn("[WARN]", ...args);
    },
    error: (...args: unknown[]) => console.error("[ERROR]", ...args),
    debug: (...args: unknown[]) => {
        if (shouldLog(level, "debug")) console.log("[DEBUG]", ...args);
    },
};

// Built only when debug lines are printed
export function logQuote(build: () => QuoteLog): void {
    if (!shouldLog(level, "debug")) return;
    logger.debug(formatQuoteLog(build()));
}

export default logger;
