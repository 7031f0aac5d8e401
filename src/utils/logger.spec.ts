import test, { mock } from 'node:test';
import assert from 'node:assert/strict';

import { formatQuoteLog, logQuote, logger, setLogLevel } from './logger.js';

test('logger: quote lines join the populated fields', () => {
    assert.equal(
        formatQuoteLog({ type: 'quote', pool: 'reserves=1/2 fee=0/1', amountIn: 5n, amountOut: 2n, impactBps: 12 }),
        '[quote] | reserves=1/2 fee=0/1 | in=5 | out=2 | impact=12bps',
    );
    assert.equal(
        formatQuoteLog({ type: 'replay', error: 'ILLIQUID_POOL', reason: 'empty' }),
        '[replay] | error=ILLIQUID_POOL | reason=empty',
    );
});

test('logger: debug lines only at debug level', () => {
    const log = mock.method(console, 'log', () => {});
    try {
        setLogLevel('info');
        logger.debug('hidden');
        assert.equal(log.mock.callCount(), 0);

        setLogLevel('debug');
        logger.debug('shown');
        assert.equal(log.mock.callCount(), 1);
        assert.deepEqual(log.mock.calls[0]?.arguments, ['[DEBUG]', 'shown']);
    } finally {
        log.mock.restore();
        setLogLevel('info');
    }
});

test('logger: quote lines are not built below debug level', () => {
    const log = mock.method(console, 'log', () => {});
    let builds = 0;
    const build = () => {
        builds++;
        return { type: 'quote', amountIn: 5n, amountOut: 2n };
    };
    try {
        setLogLevel('info');
        logQuote(build);
        assert.equal(builds, 0);
        assert.equal(log.mock.callCount(), 0);

        setLogLevel('debug');
        logQuote(build);
        assert.equal(builds, 1);
        assert.deepEqual(log.mock.calls[0]?.arguments, ['[DEBUG]', '[quote] | in=5 | out=2']);
    } finally {
        log.mock.restore();
        setLogLevel('info');
    }
});
