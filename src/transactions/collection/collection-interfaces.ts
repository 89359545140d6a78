import { CollectionConfig } from '../../staking/config-store.js';

export interface CollectionInitializeData {
    config: CollectionConfig;
}

export interface CollectionWithdrawData {
    to: string;
}
