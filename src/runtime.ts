import { Clock, systemClock } from './clock.js';
import { NftCollection } from './collection.js';
import config from './config.js';
import { StakingError, StakingErrorKind } from './errors.js';
import { TokenLedger } from './ledger/token-ledger.js';
import { Treasury } from './ledger/treasury.js';
import { CollectionConfig, ConfigStore } from './staking/config-store.js';
import { StakeEngine } from './staking/stake-engine.js';
import { StakeLedger } from './staking/stake-ledger.js';
import type { EventDocument } from './utils/event-logger.js';

export interface RuntimeOptions {
    admin: string;
    collection?: CollectionConfig;
    clock?: Clock;
}

/**
 * Everything one node holds in memory: configuration, ledgers, engine and recent events.
 */
export class Runtime {
    readonly config: ConfigStore;
    readonly tokens = new TokenLedger();
    readonly stakes = new StakeLedger();
    readonly treasury = new Treasury();
    readonly engine: StakeEngine;
    readonly collection: NftCollection;
    readonly clock: Clock;
    readonly events: EventDocument[] = [];
    private latestTime = 0;
    private eventSequence = 0;

    constructor(options: RuntimeOptions) {
        this.config = new ConfigStore(options.admin, options.collection);
        this.clock = options.clock ?? systemClock;
        this.engine = new StakeEngine(this.config, this.tokens, this.stakes);
        this.collection = new NftCollection(this.config, this.tokens, this.treasury, this.engine);
    }

    get lastSeenTime(): number {
        return this.latestTime;
    }

    /**
     * Time a transaction runs at: its own timestamp if given, the clock otherwise.
     * Never earlier than what was already seen, never more than `maxDrift` ahead of the clock.
     */
    timeFor(ts?: number): number {
        const clockNow = this.clock.now();
        const now = ts ?? clockNow;
        if (now > clockNow + config.maxDrift) {
            throw new StakingError(StakingErrorKind.CLOCK_DRIFT, `Time ${now} is too far ahead of node time ${clockNow}`, { now, clock: clockNow });
        }
        if (now < this.latestTime) {
            throw new StakingError(StakingErrorKind.CLOCK_REGRESSION, `Time ${now} is before last seen time ${this.latestTime}`, { now, latest: this.latestTime });
        }
        return now;
    }

    markTime(now: number): void {
        if (now > this.latestTime) this.latestTime = now;
    }

    /** Increases with every recorded event, including ones already trimmed from `events`. */
    nextEventSequence(): number {
        return this.eventSequence++;
    }
}

let current: Runtime | undefined;

export function getRuntime(): Runtime {
    if (!current) {
        throw new Error('Runtime has not been set up');
    }
    return current;
}

export function setRuntime(runtime: Runtime): Runtime {
    current = runtime;
    return runtime;
}
