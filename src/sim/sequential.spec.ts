import test from 'node:test';
import assert from 'node:assert/strict';

import { replaySwaps } from './sequential.js';
import { metrics } from '../instrument/metrics.js';
import { quoteForward } from './math/constantProduct.js';
import { newPoolState } from '../state/poolState.js';
import { ErrorClass, SwapDirection } from '../types.js';

const pool = newPoolState(1_000_000n, 2_000_000n, 30n, 10_000n);

test('sequential: each step sees the reserves the previous one left', () => {
    const r = replaySwaps(pool, [
        { direction: SwapDirection.AtoB, request: { kind: 'exactIn', amountIn: 10_000n } },
        { direction: SwapDirection.AtoB, request: { kind: 'exactIn', amountIn: 5_000n } },
        { direction: SwapDirection.BtoA, request: { kind: 'exactIn', amountIn: 19_743n } },
    ]);

    assert.equal(r.success, true);
    assert.deepEqual(r.quotes.map(q => q.amountOut), [19_743n, 9_725n, 10_038n]);
    assert.equal(r.finalState.reserveIn, 1_004_962n);
    assert.equal(r.finalState.reserveOut, 1_990_275n);
    assert.equal(r.quotes[2]?.nextState.reserveIn, 1_004_962n);

    // Order matters: the second swap alone would have done better
    assert.equal(quoteForward(pool, 5_000n), 9_920n);

    // Input snapshot untouched
    assert.equal(pool.reserveIn, 1_000_000n);
});

test('sequential: stops at the first failing step and keeps the last good state', () => {
    const before = metrics.snapshot().replaysExecuted;

    const r = replaySwaps(pool, [
        { direction: SwapDirection.AtoB, request: { kind: 'exactIn', amountIn: 10_000n } },
        { direction: SwapDirection.BtoA, request: { kind: 'exactOut', amountOut: 2_000_000n } },
        { direction: SwapDirection.AtoB, request: { kind: 'exactIn', amountIn: 1n } },
    ]);

    assert.equal(r.success, false);
    assert.equal(r.failedStep, 1);
    assert.equal(r.error, ErrorClass.InsufficientLiquidity);
    assert.equal(r.quotes.length, 1);
    assert.equal(r.finalState.reserveIn, 1_010_000n);
    assert.equal(r.finalState.reserveOut, 1_980_257n);
    assert.equal(metrics.snapshot().replaysExecuted, before + 1n);
});

test('sequential: empty replay returns the state unchanged', () => {
    const r = replaySwaps(pool, []);
    assert.equal(r.success, true);
    assert.equal(r.finalState, pool);
    assert.equal(r.quotes.length, 0);
});
