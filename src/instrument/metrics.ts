/**
 * Metrics Collection
 *
 * Counters and latency for the simulation layer. The pure math never
 * touches these.
 */

import type { ErrorClass, Metrics } from '../types.js';
import { readEngineConfig } from '../config.js';
import { LatencyAccumulator } from './timing.js';

export class MetricsCollector {
    quotesExecuted = 0n;
    quotesSucceeded = 0n;
    quotesFailed = 0n;
    replaysExecuted = 0n;

    private failuresByClass = new Map<ErrorClass, bigint>();
    private latency: LatencyAccumulator;

    constructor(latencySampleLimit: number = 10000) {
        this.latency = new LatencyAccumulator(latencySampleLimit);
    }

    // --- Increment methods ---

    incrQuoteExecuted(): void { this.quotesExecuted++; }
    incrQuoteSuccess(): void { this.quotesSucceeded++; }
    incrReplay(): void { this.replaysExecuted++; }

    incrQuoteFailure(errorClass: ErrorClass): void {
        this.quotesFailed++;
        this.failuresByClass.set(errorClass, (this.failuresByClass.get(errorClass) ?? 0n) + 1n);
    }

    recordQuoteLatency(latencyUs: number): void {
        this.latency.add(latencyUs);
    }

    // --- Snapshot ---

    snapshot(): Metrics {
        const failuresByClass: Partial<Record<ErrorClass, bigint>> = {};
        for (const [errorClass, count] of this.failuresByClass) {
            failuresByClass[errorClass] = count;
        }

        return {
            quotesExecuted: this.quotesExecuted,
            quotesSucceeded: this.quotesSucceeded,
            quotesFailed: this.quotesFailed,
            failuresByClass,
            replaysExecuted: this.replaysExecuted,
            quoteLatency: this.latency.getHistogram(),
        };
    }

    quoteSuccessRate(): number {
        if (this.quotesExecuted === 0n) return 100;
        return Number((this.quotesSucceeded * 10000n) / this.quotesExecuted) / 100;
    }

    // --- Reset ---

    reset(): void {
        this.quotesExecuted = 0n;
        this.quotesSucceeded = 0n;
        this.quotesFailed = 0n;
        this.replaysExecuted = 0n;
        this.failuresByClass.clear();
        this.latency.clear();
    }
}

// Global singleton
export const metrics = new MetricsCollector(readEngineConfig().latencySampleLimit);
