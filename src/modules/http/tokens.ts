import express, { Request, Response } from 'express';

import { getRuntime } from '../../runtime.js';
import { StakePolicy } from '../../staking/stake-record.js';
import { parseTokenId, sendError } from './utils.js';

const router = express.Router();

function resolveNow(req: Request): number | undefined {
    const runtime = getRuntime();
    if (req.query.at === undefined) return Math.max(runtime.clock.now(), runtime.lastSeenTime);
    const at = Number(req.query.at);
    return Number.isSafeInteger(at) && at >= 0 ? at : undefined;
}

/**
 * Staking view of one token. `?at=<seconds>` evaluates the projections at another time.
 */
router.get('/:tokenId', (req: Request, res: Response) => {
    const tokenId = parseTokenId(req.params.tokenId);
    const now = resolveNow(req);
    if (tokenId === undefined || now === undefined) {
        res.status(400).json({ error: 'BadRequest', message: 'tokenId and at must be non-negative integers' });
        return;
    }
    try {
        const { engine, tokens } = getRuntime();
        const owner = tokens.ownerOf(tokenId);
        const token = tokens.getToken(tokenId);
        const record = engine.getRecord(tokenId);
        res.json({
            tokenId,
            owner,
            createdAt: token?.createdAt,
            lastTransferAt: token?.lastTransferAt ?? null,
            at: now,
            staked: engine.isStaked(tokenId, now),
            autoStaked: engine.isAutoStaked(tokenId, now),
            canUnstake: engine.canUnstake(tokenId, now),
            record: {
                isStaked: record.isStaked,
                firstStakedAt: record.firstStakedAt ?? null,
                lastStakedAt: record.lastStakedAt,
                accumulatedDuration: record.accumulatedDuration,
            },
            durations: {
                current: engine.getStakeDuration(tokenId, StakePolicy.CURRENT, now),
                alive: engine.getStakeDuration(tokenId, StakePolicy.ALIVE, now),
                cumulative: engine.getStakeDuration(tokenId, StakePolicy.CUMULATIVE, now),
            },
            evolution: engine.evolutionOf(tokenId, now) ?? null,
            uri: engine.tokenURI(tokenId, now),
        });
    } catch (error) {
        sendError(res, error, `Error fetching token ${tokenId}`);
    }
});

router.get('/:tokenId/uri', (req: Request, res: Response) => {
    const tokenId = parseTokenId(req.params.tokenId);
    const now = resolveNow(req);
    if (tokenId === undefined || now === undefined) {
        res.status(400).json({ error: 'BadRequest', message: 'tokenId and at must be non-negative integers' });
        return;
    }
    try {
        res.json({ tokenId, uri: getRuntime().engine.tokenURI(tokenId, now) });
    } catch (error) {
        sendError(res, error, `Error fetching URI of token ${tokenId}`);
    }
});

router.get('/owner/:account', (req: Request, res: Response) => {
    try {
        const owned = getRuntime().tokens.tokensOf(req.params.account);
        res.json({ account: req.params.account, tokens: owned, total: owned.length });
    } catch (error) {
        sendError(res, error, `Error listing tokens of ${req.params.account}`);
    }
});

export default router;
