/**
 * Simulation Engine
 *
 * Non-throwing entry point for routing and simulation loops. Wraps quoteSwap,
 * classifies quote failures into ErrorClass and records latency.
 */

import type { PoolState, SimResult, TradeRequest } from '../types.js';
import { isQuoteError } from '../errors.js';
import { describePool } from '../state/poolState.js';
import { quoteSwap } from './math/constantProduct.js';
import { metrics } from '../instrument/metrics.js';
import { elapsedUs } from '../instrument/timing.js';
import { logQuote } from '../utils/logger.js';

function requestedAmount(request: TradeRequest): { amountIn?: bigint; amountOut?: bigint } {
    return request.kind === 'exactIn'
        ? { amountIn: request.amountIn }
        : { amountOut: request.amountOut };
}

/**
 * Simulate single swap
 *
 * QuoteErrors come back as { success: false }. Anything else is a
 * programming fault and is re-thrown.
 */
export function simulate(state: PoolState, request: TradeRequest): SimResult {
    const startNs = process.hrtime.bigint();
    metrics.incrQuoteExecuted();

    try {
        const quote = quoteSwap(state, request);
        const latencyUs = elapsedUs(startNs);

        metrics.recordQuoteLatency(latencyUs);
        metrics.incrQuoteSuccess();

        logQuote(() => ({
            type: 'quote',
            pool: describePool(state),
            amountIn: quote.amountIn,
            amountOut: quote.amountOut,
            impactBps: quote.priceImpactBps,
        }));

        return { success: true, quote, latencyUs };
    } catch (e) {
        if (!isQuoteError(e)) throw e;

        const latencyUs = elapsedUs(startNs);
        metrics.recordQuoteLatency(latencyUs);
        metrics.incrQuoteFailure(e.class);

        const error = e;
        logQuote(() => ({
            type: 'quote',
            pool: describePool(state),
            ...requestedAmount(request),
            error: error.class,
            reason: error.message,
        }));

        return { success: false, error: e.class, message: e.message, latencyUs };
    }
}
