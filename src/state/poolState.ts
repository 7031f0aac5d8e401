/**
 * Pool State
 *
 * Immutable snapshot of one constant-product pool in a given trade direction.
 * Quotes read it; only commit() produces a successor.
 */

import bs58 from 'bs58';

import type { PoolState } from '../types.js';
import { ErrorClass } from '../types.js';
import { QuoteError } from '../errors.js';
import { MAX_U256 } from '../sim/math/u256.js';
import { BPS_DENOMINATOR, validateFee } from '../sim/math/fees.js';

export interface PoolStateOptions {
    /** 32-byte pool pubkey, copied into the state */
    poolId?: Uint8Array;
}

function assertReserve(value: bigint, what: string): void {
    if (value < 0n) {
        throw new QuoteError(ErrorClass.InvalidPoolConfig, `${what} must be non-negative`, {
            [what]: value,
        });
    }
    if (value > MAX_U256) {
        throw new QuoteError(ErrorClass.InvalidPoolConfig, `${what} exceeds u256 range`, {
            [what]: value,
        });
    }
}

/**
 * Build a validated pool state
 *
 * Zero reserves are accepted here; any quote against such a pool fails
 * with IlliquidPool.
 */
export function newPoolState(
    reserveIn: bigint,
    reserveOut: bigint,
    feeNumerator: bigint,
    feeDenominator: bigint,
    options: PoolStateOptions = {}
): PoolState {
    assertReserve(reserveIn, 'reserveIn');
    assertReserve(reserveOut, 'reserveOut');
    validateFee({ feeNumerator, feeDenominator });

    const { poolId } = options;
    if (poolId !== undefined && poolId.length !== 32) {
        throw new QuoteError(
            ErrorClass.InvalidPoolConfig,
            `poolId must be 32 bytes, got ${poolId.length}`,
        );
    }

    return Object.freeze({
        reserveIn,
        reserveOut,
        feeNumerator,
        feeDenominator,
        ...(poolId !== undefined ? { poolId: Uint8Array.from(poolId) } : {}),
    });
}

/** Fee given in basis points (denominator 10_000) */
export function poolStateFromBps(
    reserveIn: bigint,
    reserveOut: bigint,
    feeBps: bigint,
    options: PoolStateOptions = {}
): PoolState {
    return newPoolState(reserveIn, reserveOut, feeBps, BPS_DENOMINATOR, options);
}

/** Same pool, quoted in the opposite direction */
export function invertPoolState(state: PoolState): PoolState {
    return withReserves(state, state.reserveOut, state.reserveIn);
}

/**
 * Successor state with new reserves. Callers have already checked the
 * reserves; no validation here.
 */
export function withReserves(state: PoolState, reserveIn: bigint, reserveOut: bigint): PoolState {
    return Object.freeze({ ...state, reserveIn, reserveOut });
}

export function isLiquid(state: PoolState): boolean {
    return state.reserveIn > 0n && state.reserveOut > 0n;
}

/** One-line rendering for logs */
export function describePool(state: PoolState): string {
    const parts: string[] = [];
    if (state.poolId) parts.push(`pool=${bs58.encode(state.poolId).slice(0, 8)}...`);
    parts.push(`reserves=${state.reserveIn}/${state.reserveOut}`);
    parts.push(`fee=${state.feeNumerator}/${state.feeDenominator}`);
    return parts.join(' ');
}
