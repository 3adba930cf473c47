export type SelectorErrorCode = 'EmptyCollection' | 'InvalidWeight' | 'InvalidCount' | 'InsufficientItems';

/**
 * Precondition failure raised by the selector. Inspect `code` to tell failures apart.
 */
export class SelectorError extends Error {
    override readonly name = 'SelectorError';

    constructor(
        readonly code: SelectorErrorCode,
        message: string
    ) {
        super(message);
    }
}

/**
 * Type guard for SelectorError, optionally narrowed to one code.
 */
export function isSelectorError(error: unknown, code?: SelectorErrorCode): error is SelectorError {
    return error instanceof SelectorError && (code === undefined || error.code === code);
}
