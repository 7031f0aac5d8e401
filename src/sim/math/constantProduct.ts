/**
 * Constant Product AMM Math
 *
 * x * y = k
 *
 * Key formulas (fee f = feeNumerator / feeDenominator, taken from the input):
 * - dy = (y * dx * (1 - f)) / (x + dx * (1 - f))     [exact output for input]
 * - dx = (x * dy) / ((y - dy) * (1 - f)) + 1         [exact input for output]
 *
 * Every division rounds in the pool's favour: outputs floor, inputs round up.
 * Intermediates are held to u512, amounts and reserves to u256.
 */

import type { PoolState, SwapQuote, TradeRequest } from '../../types.js';
import { ErrorClass } from '../../types.js';
import { QuoteError, isQuoteError } from '../../errors.js';
import { isLiquid, withReserves } from '../../state/poolState.js';
import { feeAmount, feeMultiplier } from './fees.js';
import { MAX_U256, assertU256, checkedAdd, checkedMul } from './u256.js';

function assertNonNegative(amount: bigint, what: string): void {
    if (amount < 0n) {
        throw new QuoteError(ErrorClass.InvalidPoolConfig, `${what} must be non-negative`, {
            [what]: amount,
        });
    }
}

function assertLiquid(state: PoolState): void {
    if (!isLiquid(state)) {
        throw new QuoteError(ErrorClass.IlliquidPool, 'cannot quote against an empty reserve', {
            reserveIn: state.reserveIn,
            reserveOut: state.reserveOut,
        });
    }
}

/**
 * Output amount for an exact input, fee applied to the input first
 *
 * amountOut = floor(amountIn*m * reserveOut / (reserveIn*D + amountIn*m)),
 * m = D - feeNumerator. Always < reserveOut.
 */
export function quoteForward(state: PoolState, amountIn: bigint): bigint {
    assertNonNegative(amountIn, 'amountIn');
    assertU256(amountIn, 'amountIn');
    assertLiquid(state);

    if (amountIn === 0n) return 0n;

    const amountInNet = checkedMul(amountIn, feeMultiplier(state), 'amountInNet');
    const numerator = checkedMul(amountInNet, state.reserveOut, 'numerator');
    const scaledReserveIn = checkedMul(state.reserveIn, state.feeDenominator, 'scaledReserveIn');
    const denominator = checkedAdd(scaledReserveIn, amountInNet, 'denominator');

    return numerator / denominator;
}

/**
 * Input amount required for a desired output
 *
 * Floor of the exact inverse plus one, so quoteForward(state, result) never
 * comes back short of amountOut.
 */
export function quoteReverse(state: PoolState, amountOut: bigint): bigint {
    assertNonNegative(amountOut, 'amountOut');
    assertLiquid(state);

    if (amountOut === 0n) return 0n;

    if (amountOut >= state.reserveOut) {
        throw new QuoteError(
            ErrorClass.InsufficientLiquidity,
            `requested ${amountOut} but output reserve is ${state.reserveOut}`,
            { amountOut, reserveOut: state.reserveOut },
        );
    }

    const scaledOut = checkedMul(state.reserveIn, amountOut, 'reserveIn*amountOut');
    const numerator = checkedMul(scaledOut, state.feeDenominator, 'numerator');
    const denominator = checkedMul(state.reserveOut - amountOut, feeMultiplier(state), 'denominator');

    return assertU256(numerator / denominator + 1n, 'amountIn');
}

function producibleOutput(state: PoolState, amountIn: bigint): bigint {
    try {
        return quoteForward(state, amountIn);
    } catch (e) {
        if (!isQuoteError(e) || e.class !== ErrorClass.ArithmeticOverflow) throw e;
        throw new QuoteError(
            ErrorClass.InvariantViolation,
            `amountIn ${amountIn} cannot be priced on this state: ${e.message}`,
            { amountIn, ...e.details },
        );
    }
}

/**
 * Apply a completed trade and return the successor state
 *
 * The full amountIn (fee included) enters the input reserve. The pair must be
 * producible by quoteForward on this state: taking less output than the
 * formula gives is allowed (the pool keeps the surplus), taking more is not.
 * A pair whose forward quote overflows was never producible either, so every
 * rejection here is InvariantViolation.
 */
export function commit(state: PoolState, amountIn: bigint, amountOut: bigint): PoolState {
    if (amountIn < 0n || amountOut < 0n) {
        throw new QuoteError(ErrorClass.InvariantViolation, 'commit amounts must be non-negative', {
            amountIn,
            amountOut,
        });
    }
    if (!isLiquid(state)) {
        throw new QuoteError(ErrorClass.InvariantViolation, 'cannot commit against an empty reserve', {
            reserveIn: state.reserveIn,
            reserveOut: state.reserveOut,
        });
    }

    const reserveIn = state.reserveIn + amountIn;
    if (reserveIn > MAX_U256) {
        throw new QuoteError(ErrorClass.InvariantViolation, 'commit would push reserveIn past u256', {
            reserveIn,
        });
    }

    const producible = producibleOutput(state, amountIn);
    if (amountOut > producible) {
        throw new QuoteError(
            ErrorClass.InvariantViolation,
            `amountOut ${amountOut} exceeds ${producible} producible from amountIn ${amountIn}`,
            { amountIn, amountOut, producible },
        );
    }

    return withReserves(state, reserveIn, state.reserveOut - amountOut);
}

/**
 * Quote a direction-tagged request and the state it would leave behind
 *
 * An input that prices fine but would push reserveIn past u256 is
 * ArithmeticOverflow: the request is too large, not a misuse of commit.
 */
export function quoteSwap(state: PoolState, request: TradeRequest): SwapQuote {
    let amountIn: bigint;
    let amountOut: bigint;

    if (request.kind === 'exactIn') {
        amountIn = request.amountIn;
        amountOut = quoteForward(state, amountIn);
    } else {
        amountOut = request.amountOut;
        amountIn = quoteReverse(state, amountOut);
    }

    checkedAdd(state.reserveIn, amountIn, 'reserveIn+amountIn', MAX_U256);

    return {
        amountIn,
        amountOut,
        feePaid: feeAmount(amountIn, state),
        priceImpactBps: calculatePriceImpact(amountIn, amountOut, state.reserveIn, state.reserveOut),
        nextState: commit(state, amountIn, amountOut),
    };
}

/**
 * Price impact in basis points, fee included
 *
 * Spot price = reserveOut / reserveIn
 * Effective price = amountOut / amountIn
 * Impact = (spot / effective - 1) * 10000
 */
export function calculatePriceImpact(
    amountIn: bigint,
    amountOut: bigint,
    reserveIn: bigint,
    reserveOut: bigint
): number {
    if (amountIn === 0n || reserveIn === 0n) return 0;

    const spotPriceNumerator = reserveOut * amountIn;
    const spotPriceDenominator = reserveIn * amountOut;

    if (spotPriceDenominator === 0n) return 10000; // 100%

    const impactBps = Number(
        ((spotPriceNumerator - spotPriceDenominator) * 10000n) / spotPriceDenominator
    );

    return Math.abs(impactBps);
}

/** Spot price of the input token in output units, for display */
export function spotPrice(state: PoolState): number {
    assertLiquid(state);
    return Number(state.reserveOut) / Number(state.reserveIn);
}

/**
 * k = x * y should stay constant (or increase due to fees)
 */
export function validateInvariant(before: PoolState, after: PoolState): boolean {
    const kBefore = before.reserveIn * before.reserveOut;
    const kAfter = after.reserveIn * after.reserveOut;
    return kAfter >= kBefore;
}
