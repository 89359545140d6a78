/**
 * How a token's staked time is turned into a single duration.
 */
export enum StakePolicy {
    /** Duration tracking disabled, always 0 */
    NONE = 'NONE',
    /** Time since the most recent stake began, whether or not the token is still staked */
    CURRENT = 'CURRENT',
    /** Time since the token was staked for the first time */
    ALIVE = 'ALIVE',
    /** Completed stake periods plus the open one, if any */
    CUMULATIVE = 'CUMULATIVE',
}

export const STAKE_POLICIES: readonly StakePolicy[] = [
    StakePolicy.NONE,
    StakePolicy.CURRENT,
    StakePolicy.ALIVE,
    StakePolicy.CUMULATIVE,
];

export function isStakePolicy(value: unknown): value is StakePolicy {
    return STAKE_POLICIES.some(policy => policy === value);
}

export interface StakeRecord {
    isStaked: boolean;
    firstStakedAt?: number;
    /** Start of the most recent manual stake, 0 if never staked */
    lastStakedAt: number;
    /** Sum of completed stake periods; the open period is not included */
    accumulatedDuration: number;
}

export function emptyStakeRecord(): StakeRecord {
    return { isStaked: false, lastStakedAt: 0, accumulatedDuration: 0 };
}

/** Start of the open manual stake period, undefined when not manually staked. */
export function stakedSince(record: StakeRecord): number | undefined {
    return record.isStaked ? record.lastStakedAt : undefined;
}

function elapsed(from: number, now: number): number {
    return Math.max(0, now - from);
}

export function getStakeDuration(record: StakeRecord, policy: StakePolicy, now: number): number {
    switch (policy) {
        case StakePolicy.NONE:
            return 0;
        case StakePolicy.CURRENT:
            return record.firstStakedAt === undefined ? 0 : elapsed(record.lastStakedAt, now);
        case StakePolicy.ALIVE:
            return record.firstStakedAt === undefined ? 0 : elapsed(record.firstStakedAt, now);
        case StakePolicy.CUMULATIVE:
            // The open period only counts while the token is actually staked
            return record.accumulatedDuration + (record.isStaked ? elapsed(record.lastStakedAt, now) : 0);
    }
}
