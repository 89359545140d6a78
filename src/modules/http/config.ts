import express from 'express';

import { getRuntime } from '../../runtime.js';
import { serializeCollectionConfig } from '../../staking/config-store.js';
import { sendError } from './utils.js';

const router = express.Router();

router.get('/', (req, res) => {
    try {
        const runtime = getRuntime();
        const store = runtime.config;
        res.json({
            initialized: store.isInitialized,
            admin: store.admin,
            config: store.isInitialized ? serializeCollectionConfig(store.get()) : null,
            totalSupply: runtime.tokens.totalSupply,
            treasuryBalance: runtime.treasury.balance.toString(),
            lastSeenTime: runtime.lastSeenTime,
        });
    } catch (error) {
        sendError(res, error, 'Failed to retrieve configuration');
    }
});

export default router;
