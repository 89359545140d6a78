/**
 * Rejection reasons raised by the staking core, the ownership ledger and the collection.
 * Every one of them is detected before any state is touched.
 */
export enum StakingErrorKind {
    // Staking
    NOT_OWNER = 'NotOwner',
    ALREADY_STAKED = 'AlreadyStaked',
    NOT_UNSTAKEABLE = 'NotUnstakeable',
    TOKEN_STAKED = 'TokenStaked',
    TOKEN_DOES_NOT_EXIST = 'TokenDoesNotExist',

    // Collection lifecycle
    NOT_INITIALIZED = 'NotInitialized',
    ALREADY_INITIALIZED = 'AlreadyInitialized',
    UNAUTHORIZED = 'Unauthorized',
    INVALID_CONFIG = 'InvalidConfig',

    // Minting
    INVALID_QUANTITY = 'InvalidQuantity',
    SUPPLY_EXCEEDED = 'SupplyExceeded',
    INSUFFICIENT_PAYMENT = 'InsufficientPayment',

    // Time
    CLOCK_REGRESSION = 'ClockRegression',
    CLOCK_DRIFT = 'ClockDrift',
}

export class StakingError extends Error {
    constructor(
        public readonly kind: StakingErrorKind,
        message: string,
        public readonly metadata?: Record<string, string | number | boolean>
    ) {
        super(`[${kind}] ${message}`);
        this.name = 'StakingError';
    }
}

export function isStakingError(error: unknown, kind?: StakingErrorKind): error is StakingError {
    return error instanceof StakingError && (kind === undefined || error.kind === kind);
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
