import test from 'node:test';
import assert from 'node:assert/strict';

import { QuoteError, classifyError, isQuoteError } from './errors.js';
import { ErrorClass } from './types.js';

test('errors: QuoteError carries its class and details', () => {
    const e = new QuoteError(ErrorClass.IlliquidPool, 'empty', { reserveIn: 0n });

    assert.ok(e instanceof Error);
    assert.equal(e.name, 'QuoteError');
    assert.equal(e.class, ErrorClass.IlliquidPool);
    assert.deepEqual(e.details, { reserveIn: 0n });
    assert.equal(isQuoteError(e), true);
    assert.equal(isQuoteError(new Error('x')), false);
});

test('errors: classifyError maps thrown values onto the taxonomy', () => {
    assert.deepEqual(classifyError(new QuoteError(ErrorClass.InvariantViolation, 'bad pair')), {
        class: ErrorClass.InvariantViolation,
        message: 'bad pair',
        details: undefined,
    });
    // Foreign faults stay outside the quote taxonomy
    assert.deepEqual(classifyError(new RangeError('Division by zero')), {
        class: ErrorClass.Unknown,
        message: 'Division by zero',
    });
    assert.deepEqual(classifyError('boom'), { class: ErrorClass.Unknown, message: 'boom' });
});
