/**
 * Quote errors
 *
 * Every failure a quote can hit is a QuoteError tagged with an ErrorClass.
 * Nothing here retries: the math is deterministic, so the caller decides
 * whether to surface the error or fall back to another pool.
 */

import type { ClassifiedError } from './types.js';
import { ErrorClass } from './types.js';

export class QuoteError extends Error {
    public readonly class: ErrorClass;
    public readonly details?: Record<string, bigint>;

    constructor(errorClass: ErrorClass, message: string, details?: Record<string, bigint>) {
        super(message);
        this.name = 'QuoteError';
        this.class = errorClass;
        this.details = details;
    }
}

export function isQuoteError(e: unknown): e is QuoteError {
    return e instanceof QuoteError;
}

/**
 * Map any thrown value onto the error taxonomy
 */
export function classifyError(e: unknown): ClassifiedError {
    if (isQuoteError(e)) {
        return { class: e.class, message: e.message, details: e.details };
    }

    return {
        class: ErrorClass.Unknown,
        message: e instanceof Error ? e.message : String(e),
    };
}
