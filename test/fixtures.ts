import { CollectionConfig } from '../src/staking/config-store.js';
import { StakePolicy } from '../src/staking/stake-record.js';

export const ADMIN = 'admin';

export function collectionConfig(overrides: Partial<CollectionConfig> = {}): CollectionConfig {
    return {
        name: 'Test Creatures',
        symbol: 'TCR',
        mintPrice: 10n,
        maxSupply: 20,
        maxPerMint: 5,
        baseUri: 'ipfs://test/',
        staking: { minStakingTime: 0, automaticStakeOnMint: 0, automaticStakeOnTransfer: 0 },
        ...overrides,
    };
}

export function evolvingConfig(overrides: Partial<CollectionConfig> = {}): CollectionConfig {
    return collectionConfig({
        evolution: { policy: StakePolicy.CUMULATIVE, strategy: { kind: 'linear', period: 10 } },
        ...overrides,
    });
}
