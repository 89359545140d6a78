import { Request, Response } from 'express';
import { StakingErrorKind, describeError, isStakingError } from '../../errors.js';
import logger from '../../logger.js';

/**
 * Get pagination parameters from request query
 * @param req Express request object
 * @returns Object with limit, skip, and page properties
 */
export const getPagination = (req: Request) => {
    const limit = Math.min(parseInt(String(req.query.limit)) || 10, 100);
    const offset = parseInt(String(req.query.offset)) || 0;
    return {
        limit,
        skip: offset,
        page: Math.floor(offset / limit) + 1,
    };
};

const statusByKind: Partial<Record<StakingErrorKind, number>> = {
    [StakingErrorKind.TOKEN_DOES_NOT_EXIST]: 404,
    [StakingErrorKind.NOT_INITIALIZED]: 503,
};

/** Maps staking errors to 4xx/5xx responses; anything else is a 500. */
export function sendError(res: Response, error: unknown, context: string): void {
    if (isStakingError(error)) {
        res.status(statusByKind[error.kind] ?? 400).json({ error: error.kind, message: error.message });
        return;
    }
    logger.error(`[http] ${context}: ${describeError(error)}`);
    res.status(500).json({ error: 'InternalError', message: describeError(error) });
}

/** Parses a positive integer path parameter, undefined when malformed. */
export function parseTokenId(raw: string): number | undefined {
    if (!/^\d+$/.test(raw)) return undefined;
    const tokenId = Number(raw);
    return Number.isSafeInteger(tokenId) && tokenId > 0 ? tokenId : undefined;
}
