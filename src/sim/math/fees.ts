/**
 * Fee helpers for constant product pools
 *
 * Fee is a fraction of the input retained by the pool, applied BEFORE the
 * swap calculation (the net input is what gets priced).
 */

import type { FeeFraction } from '../../types.js';
import { ErrorClass } from '../../types.js';
import { QuoteError } from '../../errors.js';
import { MAX_U256, mulDivFloor } from './u256.js';

export const BPS_DENOMINATOR = 10_000n;

export const FEE_PRESETS = {
    Bps1: { feeNumerator: 1n, feeDenominator: BPS_DENOMINATOR },
    Bps5: { feeNumerator: 5n, feeDenominator: BPS_DENOMINATOR },
    Bps25: { feeNumerator: 25n, feeDenominator: BPS_DENOMINATOR },
    Bps30: { feeNumerator: 30n, feeDenominator: BPS_DENOMINATOR },
    Bps100: { feeNumerator: 100n, feeDenominator: BPS_DENOMINATOR },
} as const satisfies Record<string, FeeFraction>;

/**
 * Check 0 <= feeNumerator < feeDenominator, denominator within u256
 */
export function validateFee(fee: FeeFraction): void {
    const { feeNumerator, feeDenominator } = fee;

    if (feeDenominator <= 0n) {
        throw new QuoteError(ErrorClass.InvalidPoolConfig, 'feeDenominator must be positive', {
            feeDenominator,
        });
    }
    if (feeDenominator > MAX_U256) {
        throw new QuoteError(ErrorClass.InvalidPoolConfig, 'feeDenominator exceeds u256 range', {
            feeDenominator,
        });
    }
    if (feeNumerator < 0n || feeNumerator >= feeDenominator) {
        throw new QuoteError(
            ErrorClass.InvalidPoolConfig,
            `fee ${feeNumerator}/${feeDenominator} outside [0, 1)`,
            { feeNumerator, feeDenominator },
        );
    }
}

/** Share of each input unit that is priced: denominator - numerator */
export function feeMultiplier(fee: FeeFraction): bigint {
    return fee.feeDenominator - fee.feeNumerator;
}

/** Fee charged on amountIn, floored (reporting only, not used in pricing) */
export function feeAmount(amountIn: bigint, fee: FeeFraction): bigint {
    if (amountIn <= 0n || fee.feeNumerator === 0n) return 0n;
    return mulDivFloor(amountIn, fee.feeNumerator, fee.feeDenominator);
}

export function feeToBps(fee: FeeFraction): number {
    // Scale by 1e4 extra before dropping to float so small fractions keep precision
    const scaled = (fee.feeNumerator * BPS_DENOMINATOR * 10_000n) / fee.feeDenominator;
    return Number(scaled) / 10_000;
}
