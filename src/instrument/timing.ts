/**
 * Timing Instrumentation
 *
 * Latency samples for quote calls, in microseconds.
 */

import type { LatencyHistogram } from '../types.js';

export function elapsedUs(startNs: bigint): number {
    return Number(process.hrtime.bigint() - startNs) / 1000;
}

/**
 * Histogram accumulator for latency measurements
 */
export class LatencyAccumulator {
    private samples: number[] = [];
    private maxSamples: number;

    constructor(maxSamples: number = 10000) {
        this.maxSamples = maxSamples;
    }

    add(latencyUs: number): void {
        if (this.samples.length >= this.maxSamples) {
            // Circular buffer - drop oldest
            this.samples.shift();
        }
        this.samples.push(latencyUs);
    }

    getHistogram(): LatencyHistogram {
        if (this.samples.length === 0) {
            return { count: 0, p50Us: 0, p95Us: 0, p99Us: 0, maxUs: 0 };
        }

        const sorted = [...this.samples].sort((a, b) => a - b);
        const count = sorted.length;

        return {
            count,
            p50Us: sorted[Math.floor(count * 0.50)] ?? 0,
            p95Us: sorted[Math.floor(count * 0.95)] ?? 0,
            p99Us: sorted[Math.floor(count * 0.99)] ?? 0,
            maxUs: sorted[count - 1] ?? 0,
        };
    }

    clear(): void {
        this.samples = [];
    }
}
