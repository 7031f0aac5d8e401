export * from './types.js';
export { QuoteError, isQuoteError, classifyError } from './errors.js';
export {
    newPoolState,
    poolStateFromBps,
    invertPoolState,
    isLiquid,
    describePool,
    type PoolStateOptions,
} from './state/poolState.js';
export {
    quoteForward,
    quoteReverse,
    commit,
    quoteSwap,
    calculatePriceImpact,
    spotPrice,
    validateInvariant,
} from './sim/math/constantProduct.js';
export {
    BPS_DENOMINATOR,
    FEE_PRESETS,
    feeAmount,
    feeMultiplier,
    feeToBps,
} from './sim/math/fees.js';
export { MAX_U256, MAX_U512 } from './sim/math/u256.js';
export { simulate } from './sim/engine.js';
export { replaySwaps } from './sim/sequential.js';
export { metrics, MetricsCollector } from './instrument/metrics.js';
export { readEngineConfig, type EngineConfig, type LogLevel } from './config.js';
export { logger, setLogLevel } from './utils/logger.js';
