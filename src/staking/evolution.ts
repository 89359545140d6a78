/**
 * Maps a staked duration (seconds) to the evolution value embedded in token URIs.
 */
export interface EvolutionStrategy {
    readonly name: string;
    compute(duration: number): number;
}

export type EvolutionStrategySpec =
    | { kind: 'constant'; value: number }
    | { kind: 'linear'; period: number; maxLevel?: number }
    | { kind: 'thresholds'; thresholds: number[] };

export function constantEvolution(value: number): EvolutionStrategy {
    return { name: 'constant', compute: () => value };
}

/** One level per full `period` staked, optionally capped. */
export function linearEvolution(period: number, maxLevel?: number): EvolutionStrategy {
    if (!Number.isSafeInteger(period) || period <= 0) {
        throw new RangeError(`[evolution] Linear period must be a positive integer, got ${period}`);
    }
    return {
        name: 'linear',
        compute: (duration: number) => {
            const level = Math.floor(Math.max(0, duration) / period);
            return maxLevel === undefined ? level : Math.min(level, maxLevel);
        },
    };
}

/** Level is the number of thresholds already reached. */
export function thresholdEvolution(thresholds: number[]): EvolutionStrategy {
    for (let i = 1; i < thresholds.length; i++) {
        if (thresholds[i] <= thresholds[i - 1]) {
            throw new RangeError('[evolution] Thresholds must be strictly increasing');
        }
    }
    const sorted = [...thresholds];
    return {
        name: 'thresholds',
        compute: (duration: number) => {
            let level = 0;
            while (level < sorted.length && sorted[level] <= duration) level++;
            return level;
        },
    };
}

export function createEvolutionStrategy(spec: EvolutionStrategySpec): EvolutionStrategy {
    switch (spec.kind) {
        case 'constant':
            return constantEvolution(spec.value);
        case 'linear':
            return linearEvolution(spec.period, spec.maxLevel);
        case 'thresholds':
            return thresholdEvolution(spec.thresholds);
    }
}
