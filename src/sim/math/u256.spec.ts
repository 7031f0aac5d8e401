import test from 'node:test';
import assert from 'node:assert/strict';

import { MAX_U256, MAX_U512, Q256, assertU256, checkedAdd, checkedMul, mulDivFloor } from './u256.js';
import { ErrorClass } from '../../types.js';

test('u256: bounds are 2^256-1 and 2^512-1', () => {
    assert.equal(Q256, 2n ** 256n);
    assert.equal(MAX_U256, 2n ** 256n - 1n);
    assert.equal(MAX_U512, 2n ** 512n - 1n);
});

test('u256: assertU256 passes the max and rejects one past it', () => {
    assert.equal(assertU256(MAX_U256, 'x'), MAX_U256);
    assert.throws(() => assertU256(MAX_U256 + 1n, 'x'), {
        class: ErrorClass.ArithmeticOverflow,
        message: 'x exceeds u256 range',
    });
});

test('u256: product of two u256 words fits the u512 bound', () => {
    assert.equal(checkedMul(MAX_U256, MAX_U256, 'p'), MAX_U256 * MAX_U256);
    assert.throws(() => checkedMul(Q256, Q256, 'p'), {
        class: ErrorClass.ArithmeticOverflow,
        message: 'p exceeds u512 range',
    });
});

test('u256: checkedAdd honours a custom bound', () => {
    assert.equal(checkedAdd(1n, 2n, 's'), 3n);
    assert.throws(() => checkedAdd(MAX_U512, 1n, 's'), { class: ErrorClass.ArithmeticOverflow });
    assert.throws(() => checkedAdd(MAX_U256, 1n, 'reserve', MAX_U256), {
        message: 'reserve exceeds u256 range',
    });
});

test('u256: mulDivFloor floors and refuses a zero divisor', () => {
    assert.equal(mulDivFloor(7n, 3n, 2n), 10n);
    assert.throws(() => mulDivFloor(1n, 1n, 0n), { class: ErrorClass.ArithmeticOverflow });
});
