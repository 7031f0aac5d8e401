/**
 * Core type definitions for the quote engine
 * These interfaces define the boundaries between state, math and simulation
 */

// ============================================================================
// POOL STATE
// ============================================================================

/**
 * Snapshot of a constant-product pool, oriented in the queried trade direction.
 * Built by newPoolState(); frozen once built.
 */
export interface PoolState {
    readonly reserveIn: bigint;
    readonly reserveOut: bigint;
    // Fee retained from the input: feeNumerator / feeDenominator
    readonly feeNumerator: bigint;
    readonly feeDenominator: bigint;
    /** Optional 32-byte pool pubkey, only used to label log lines */
    readonly poolId?: Uint8Array;
}

export interface FeeFraction {
    feeNumerator: bigint;
    feeDenominator: bigint;
}

// ============================================================================
// TRADE TYPES
// ============================================================================

/** Direction of swap, relative to the orientation a PoolState was built in */
export const SwapDirection = {
    AtoB: 0,
    BtoA: 1,
} as const;

export type SwapDirection = (typeof SwapDirection)[keyof typeof SwapDirection];

/**
 * Direction-tagged trade request:
 * - exactIn: amountIn is offered, quote the output
 * - exactOut: amountOut is desired, quote the input required
 */
export type TradeRequest =
    | { kind: 'exactIn'; amountIn: bigint }
    | { kind: 'exactOut'; amountOut: bigint };

export interface SwapQuote {
    amountIn: bigint;
    amountOut: bigint;
    feePaid: bigint;
    priceImpactBps: number;
    /** State after the quote is committed; the input state is untouched */
    nextState: PoolState;
}

// ============================================================================
// SIMULATION TYPES
// ============================================================================

export type SimResult =
    | { success: true; quote: SwapQuote; latencyUs: number }
    | { success: false; error: ErrorClass; message: string; latencyUs: number };

export interface ReplayStep {
    direction: SwapDirection;
    request: TradeRequest;
}

export interface ReplayResult {
    success: boolean;
    quotes: SwapQuote[];
    /** Last good state, in the orientation of the state passed in */
    finalState: PoolState;
    failedStep?: number;
    error?: ErrorClass;
    message?: string;
}

// ============================================================================
// ERROR TYPES
// ============================================================================

export const ErrorClass = {
    InvalidPoolConfig: 'INVALID_POOL_CONFIG',
    IlliquidPool: 'ILLIQUID_POOL',
    InsufficientLiquidity: 'INSUFFICIENT_LIQUIDITY',
    ArithmeticOverflow: 'ARITHMETIC_OVERFLOW',
    InvariantViolation: 'INVARIANT_VIOLATION',
    Unknown: 'UNKNOWN',
} as const;

export type ErrorClass = (typeof ErrorClass)[keyof typeof ErrorClass];

export interface ClassifiedError {
    class: ErrorClass;
    message: string;
    details?: Record<string, bigint>;
}

// ============================================================================
// INSTRUMENTATION TYPES
// ============================================================================

export interface LatencyHistogram {
    count: number;
    p50Us: number;
    p95Us: number;
    p99Us: number;
    maxUs: number;
}

export interface Metrics {
    quotesExecuted: bigint;
    quotesSucceeded: bigint;
    quotesFailed: bigint;
    failuresByClass: Partial<Record<ErrorClass, bigint>>;
    replaysExecuted: bigint;
    quoteLatency: LatencyHistogram;
}
