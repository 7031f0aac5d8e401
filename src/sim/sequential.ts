/**
 * Sequential Swap Replay
 *
 * CPMM swaps are ORDER-DEPENDENT: you cannot sum deltas, you must replay.
 * Each step is quoted against the state the previous step committed.
 *
 * Example:
 *   Initial: reserves 1000 / 100
 *   Step 0: AtoB 10 in  -> reserves move, A gets cheaper
 *   Step 1: AtoB 5 in   -> gets LESS than it would have alone
 *   Step 2: BtoA step 0's output back in
 */

import type { PoolState, ReplayResult, ReplayStep, SwapQuote } from '../types.js';
import { SwapDirection } from '../types.js';
import { invertPoolState } from '../state/poolState.js';
import { metrics } from '../instrument/metrics.js';
import { logger } from '../utils/logger.js';
import { simulate } from './engine.js';

/**
 * Orient the state for a step. BtoA steps quote against the inverted view.
 */
function orient(state: PoolState, direction: SwapDirection): PoolState {
    return direction === SwapDirection.AtoB ? state : invertPoolState(state);
}

/**
 * Replay swaps against one pool in order
 *
 * Stops at the first failing step; finalState is then the state before it.
 * finalState and every quote's nextState are in the orientation of `state`.
 */
export function replaySwaps(state: PoolState, steps: readonly ReplayStep[]): ReplayResult {
    metrics.incrReplay();

    const quotes: SwapQuote[] = [];
    let current = state;

    for (const [i, step] of steps.entries()) {
        const result = simulate(orient(current, step.direction), step.request);

        if (!result.success) {
            logger.debug(`[replay] step ${i} failed: ${result.error}`);
            return {
                success: false,
                quotes,
                finalState: current,
                failedStep: i,
                error: result.error,
                message: result.message,
            };
        }

        current = orient(result.quote.nextState, step.direction);
        quotes.push({ ...result.quote, nextState: current });
    }

    return { success: true, quotes, finalState: current };
}
