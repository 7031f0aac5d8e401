/**
 * Checked wide-integer arithmetic
 *
 * bigint never wraps, so the 256-bit ledger bounds are enforced here instead.
 * Token amounts and reserves live in u256; an intermediate may use the full
 * width of a product of two u256 words (u512). Anything past the bound throws
 * ArithmeticOverflow.
 */

import { QuoteError } from '../../errors.js';
import { ErrorClass } from '../../types.js';

export const Q256 = 1n << 256n;
export const MAX_U256 = Q256 - 1n;
export const MAX_U512 = (1n << 512n) - 1n;

function overflow(what: string, value: bigint, bound: bigint): never {
    throw new QuoteError(
        ErrorClass.ArithmeticOverflow,
        `${what} exceeds ${bound === MAX_U256 ? 'u256' : 'u512'} range`,
        { [what]: value },
    );
}

export function assertU256(value: bigint, what: string): bigint {
    if (value > MAX_U256) overflow(what, value, MAX_U256);
    return value;
}

export function checkedMul(a: bigint, b: bigint, what: string, bound: bigint = MAX_U512): bigint {
    const product = a * b;
    if (product > bound) overflow(what, product, bound);
    return product;
}

export function checkedAdd(a: bigint, b: bigint, what: string, bound: bigint = MAX_U512): bigint {
    const sum = a + b;
    if (sum > bound) overflow(what, sum, bound);
    return sum;
}

/** floor(a * b / d) with the product held to u512 */
export function mulDivFloor(a: bigint, b: bigint, d: bigint): bigint {
    if (d === 0n) {
        throw new QuoteError(ErrorClass.ArithmeticOverflow, 'mulDiv: division by zero');
    }
    return checkedMul(a, b, 'mulDiv') / d;
}
