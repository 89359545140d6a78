import config from '../config.js';
import { StakingError, StakingErrorKind } from '../errors.js';
import logger from '../logger.js';
import { parseAmount } from '../utils/bigint.js';
import validate from '../validation/index.js';
import { EvolutionStrategy, EvolutionStrategySpec, createEvolutionStrategy } from './evolution.js';
import { StakePolicy, isStakePolicy } from './stake-record.js';

/** Durations in seconds; 0 disables the behaviour. */
export interface StakingConfig {
    minStakingTime: number;
    automaticStakeOnMint: number;
    automaticStakeOnTransfer: number;
}

export interface EvolutionConfig {
    policy: StakePolicy;
    strategy: EvolutionStrategySpec;
}

export interface CollectionConfig {
    name: string;
    symbol: string;
    mintPrice: bigint;
    maxSupply: number;
    maxPerMint: number;
    /** Prefix of token URIs; empty disables URIs */
    baseUri: string;
    staking: StakingConfig;
    evolution?: EvolutionConfig;
}

export type ConfigState =
    | { status: 'uninitialized' }
    | { status: 'initialized'; config: Readonly<CollectionConfig>; evolution?: EvolutionStrategy };

function invalid(message: string): StakingError {
    return new StakingError(StakingErrorKind.INVALID_CONFIG, message);
}

function readDuration(raw: Record<string, unknown>, key: keyof StakingConfig): number {
    const value = raw[key] ?? 0;
    if (!validate.integer(value, true, false, config.maxDuration)) {
        throw invalid(`staking.${key} must be a non-negative integer number of seconds`);
    }
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEvolutionSpec(raw: unknown): EvolutionStrategySpec {
    if (!isRecord(raw)) throw invalid('evolution.strategy must be an object');
    switch (raw.kind) {
        case 'constant': {
            const value = raw.value;
            if (!validate.integer(value, true, false)) throw invalid('evolution.strategy.value must be a non-negative integer');
            return { kind: 'constant', value };
        }
        case 'linear': {
            const period = raw.period;
            const maxLevel = raw.maxLevel;
            if (!validate.integer(period, false, false, config.maxDuration)) throw invalid('evolution.strategy.period must be a positive integer');
            if (maxLevel === undefined) return { kind: 'linear', period };
            if (!validate.integer(maxLevel, true, false)) throw invalid('evolution.strategy.maxLevel must be a non-negative integer');
            return { kind: 'linear', period, maxLevel };
        }
        case 'thresholds': {
            const thresholds = raw.thresholds;
            if (!Array.isArray(thresholds) || thresholds.length === 0) throw invalid('evolution.strategy.thresholds must be a non-empty array');
            const values: number[] = [];
            for (const threshold of thresholds) {
                if (!validate.integer(threshold, true, false, config.maxDuration)) throw invalid('evolution.strategy.thresholds must hold non-negative integers');
                if (values.length > 0 && threshold <= values[values.length - 1]) throw invalid('evolution.strategy.thresholds must be strictly increasing');
                values.push(threshold);
            }
            return { kind: 'thresholds', thresholds: values };
        }
        default:
            throw invalid(`Unknown evolution strategy ${String(raw.kind)}`);
    }
}

/**
 * Checks an untrusted value (JSON file, transaction payload) and builds a collection configuration.
 */
export function parseCollectionConfig(raw: unknown): CollectionConfig {
    if (!isRecord(raw)) throw invalid('Collection configuration must be an object');

    const { name, symbol, maxSupply } = raw;
    if (!validate.string(name, config.collectionNameMaxLength, 1)) {
        throw invalid(`name must be 1-${config.collectionNameMaxLength} characters`);
    }
    if (!validate.string(symbol, config.collectionSymbolMaxLength, config.collectionSymbolMinLength, config.collectionSymbolAllowedChars)) {
        throw invalid(`Invalid collection symbol ${String(symbol)}`);
    }
    const mintPrice = parseAmount(raw.mintPrice ?? 0);
    if (mintPrice === undefined || !validate.bigint(mintPrice, true, false)) {
        throw invalid('mintPrice must be a non-negative integer amount');
    }
    if (!validate.integer(maxSupply, false, false, config.maxSupply)) {
        throw invalid(`maxSupply must be between 1 and ${config.maxSupply}`);
    }
    const maxPerMint = raw.maxPerMint ?? config.maxPerMint;
    if (!validate.integer(maxPerMint, false, false, config.maxPerMint)) {
        throw invalid(`maxPerMint must be between 1 and ${config.maxPerMint}`);
    }
    const baseUri = raw.baseUri ?? '';
    if (!validate.string(baseUri, config.baseUriMaxLength)) {
        throw invalid(`baseUri must be a string of at most ${config.baseUriMaxLength} characters`);
    }

    const stakingRaw = raw.staking ?? {};
    if (!isRecord(stakingRaw)) throw invalid('staking must be an object');
    const staking: StakingConfig = {
        minStakingTime: readDuration(stakingRaw, 'minStakingTime'),
        automaticStakeOnMint: readDuration(stakingRaw, 'automaticStakeOnMint'),
        automaticStakeOnTransfer: readDuration(stakingRaw, 'automaticStakeOnTransfer'),
    };

    const parsed: CollectionConfig = {
        name,
        symbol,
        mintPrice,
        maxSupply,
        maxPerMint,
        baseUri,
        staking,
    };

    const evolution = raw.evolution;
    if (evolution !== undefined) {
        if (!isRecord(evolution)) throw invalid('evolution must be an object');
        const policy = evolution.policy;
        if (!isStakePolicy(policy)) throw invalid(`Unknown evolution policy ${String(policy)}`);
        parsed.evolution = { policy, strategy: parseEvolutionSpec(evolution.strategy) };
    }
    return parsed;
}

function freeze(collection: CollectionConfig): Readonly<CollectionConfig> {
    const copy: CollectionConfig = { ...collection, staking: Object.freeze({ ...collection.staking }) };
    if (collection.evolution) copy.evolution = Object.freeze({ ...collection.evolution });
    return Object.freeze(copy);
}

/**
 * Holds the collection configuration.
 * Starts uninitialized unless a configuration is passed in; `initialize` may succeed exactly once.
 */
export class ConfigStore {
    private state: ConfigState = { status: 'uninitialized' };

    constructor(public readonly admin: string, initial?: CollectionConfig) {
        if (initial) this.apply(initial);
    }

    get isInitialized(): boolean {
        return this.state.status === 'initialized';
    }

    initialize(collection: CollectionConfig, caller: string): void {
        if (caller !== this.admin) {
            throw new StakingError(StakingErrorKind.UNAUTHORIZED, `${caller} may not initialize the collection`, { caller });
        }
        if (this.state.status === 'initialized') {
            throw new StakingError(StakingErrorKind.ALREADY_INITIALIZED, 'Collection is already initialized');
        }
        this.apply(collection);
        logger.info(`[config-store] Collection ${collection.symbol} initialized by ${caller}`);
    }

    get(): Readonly<CollectionConfig> {
        if (this.state.status !== 'initialized') {
            throw new StakingError(StakingErrorKind.NOT_INITIALIZED, 'Collection is not initialized');
        }
        return this.state.config;
    }

    get staking(): Readonly<StakingConfig> {
        return this.get().staking;
    }

    /** The configured evolution strategy, undefined when URIs carry no evolution segment. */
    get evolution(): EvolutionStrategy | undefined {
        return this.state.status === 'initialized' ? this.state.evolution : undefined;
    }

    private apply(collection: CollectionConfig): void {
        // Hand-built configurations go through the same checks as parsed ones
        const checked = parseCollectionConfig(serializeCollectionConfig(collection));
        const frozen = freeze(checked);
        this.state = {
            status: 'initialized',
            config: frozen,
            evolution: frozen.evolution ? createEvolutionStrategy(frozen.evolution.strategy) : undefined,
        };
    }
}

/** Plain JSON form of a configuration, readable again by `parseCollectionConfig`. */
export function serializeCollectionConfig(collection: Readonly<CollectionConfig>): Record<string, unknown> {
    const serialized: Record<string, unknown> = {
        name: collection.name,
        symbol: collection.symbol,
        mintPrice: collection.mintPrice.toString(),
        maxSupply: collection.maxSupply,
        maxPerMint: collection.maxPerMint,
        baseUri: collection.baseUri,
        staking: { ...collection.staking },
    };
    if (collection.evolution) {
        serialized.evolution = { policy: collection.evolution.policy, strategy: { ...collection.evolution.strategy } };
    }
    return serialized;
}
