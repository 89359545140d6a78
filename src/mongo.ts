import mongoose from 'mongoose';
import logger from './logger.js';
import { CollectionStateModel, IPayout } from './models/collectionState.js';
import { StakeRecordModel } from './models/stakeRecord.js';
import { TokenModel } from './models/token.js';
import { Runtime, RuntimeOptions } from './runtime.js';
import { parseCollectionConfig, serializeCollectionConfig } from './staking/config-store.js';
import { describeError } from './errors.js';
import { TokenInfo } from './ledger/token-ledger.js';
import { StakeRecord } from './staking/stake-record.js';
import { toBigInt, toDbString } from './utils/bigint.js';

const STATE_ID = 0;

export async function connect(url: string, dbName: string): Promise<void> {
    await mongoose.connect(url, { dbName });
    logger.info(`Connected to ${url}/${dbName}`);
}

export async function disconnect(): Promise<void> {
    await mongoose.disconnect();
    logger.info('MongoDB connection closed');
}

/**
 * Rebuilds a runtime from the stored collection state, tokens and stake records.
 * A stored configuration wins over the one in `options`.
 */
export async function loadState(options: RuntimeOptions): Promise<Runtime> {
    const state = await CollectionStateModel.findById(STATE_ID).lean();
    const storedConfig = state?.config ? parseCollectionConfig(state.config) : undefined;
    const runtime = new Runtime({ ...options, collection: storedConfig ?? options.collection });

    if (state) {
        if (state.admin !== options.admin) {
            logger.warn(`[mongo] Stored administrator ${state.admin} differs from configured ${options.admin}; using configured value`);
        }
        const payouts: Array<[string, bigint]> = state.payouts.map((payout: IPayout) => [payout.account, toBigInt(payout.amount)]);
        runtime.treasury.restore(toBigInt(state.treasuryBalance), payouts);
        runtime.markTime(state.lastSeenTime);
    }

    const tokens = await TokenModel.find().lean();
    for (const token of tokens) {
        runtime.tokens.restore(token._id, {
            owner: token.owner,
            createdAt: token.createdAt,
            autoStakeOnMint: token.autoStakeOnMint,
            lastTransferAt: token.lastTransferAt ?? undefined,
            autoStakeOnTransfer: token.autoStakeOnTransfer,
        });
    }

    const records = await StakeRecordModel.find().lean();
    for (const record of records) {
        runtime.stakes.restore(record._id, {
            isStaked: record.isStaked,
            firstStakedAt: record.firstStakedAt ?? undefined,
            lastStakedAt: record.lastStakedAt,
            accumulatedDuration: record.accumulatedDuration,
        });
    }

    logger.info(`[mongo] Loaded ${tokens.length} tokens and ${records.length} stake records`);
    return runtime;
}

export interface CollectionStateUpdate {
    admin: string;
    config?: Record<string, unknown>;
    treasuryBalance: string;
    payouts: IPayout[];
    lastSeenTime: number;
}

/**
 * Where `saveState` writes to. The default goes through the mongoose models.
 */
export interface StateWriter {
    writeTokens(rows: Array<[number, TokenInfo]>): Promise<void>;
    writeStakeRecords(rows: Array<[number, StakeRecord]>): Promise<void>;
    writeCollectionState(update: CollectionStateUpdate): Promise<void>;
}

export const mongoStateWriter: StateWriter = {
    async writeTokens(rows) {
        await TokenModel.bulkWrite(rows.map(([tokenId, token]) => ({
            replaceOne: { filter: { _id: tokenId }, replacement: { _id: tokenId, ...token }, upsert: true },
        })));
    },
    async writeStakeRecords(rows) {
        await StakeRecordModel.bulkWrite(rows.map(([tokenId, record]) => ({
            replaceOne: { filter: { _id: tokenId }, replacement: { _id: tokenId, ...record }, upsert: true },
        })));
    },
    async writeCollectionState(update) {
        await CollectionStateModel.updateOne({ _id: STATE_ID }, { $set: update }, { upsert: true });
    },
};

async function writeState(runtime: Runtime, writer: StateWriter): Promise<void> {
    const tokens = runtime.tokens.takeDirty();
    const records = runtime.stakes.takeDirty();

    const update: CollectionStateUpdate = {
        admin: runtime.config.admin,
        treasuryBalance: toDbString(runtime.treasury.balance),
        payouts: runtime.treasury.payoutEntries().map(([account, amount]) => ({ account, amount: toDbString(amount) })),
        lastSeenTime: runtime.lastSeenTime,
    };
    if (runtime.config.isInitialized) {
        update.config = serializeCollectionConfig(runtime.config.get());
    }

    try {
        if (tokens.length > 0) await writer.writeTokens(tokens);
        if (records.length > 0) await writer.writeStakeRecords(records);
        await writer.writeCollectionState(update);
    } catch (error) {
        // Rows written before the failure are rewritten next time; upserts are idempotent
        runtime.tokens.markDirty(tokens.map(([tokenId]) => tokenId));
        runtime.stakes.markDirty(records.map(([tokenId]) => tokenId));
        throw error;
    }
    logger.debug(`[mongo] Saved ${tokens.length} tokens and ${records.length} stake records`);
}

let lastFlush: Promise<void> = Promise.resolve();

/**
 * Writes the collection state and every token and stake record changed since the last successful save.
 * Calls run one after another; a failed save leaves its rows queued for the next one.
 */
export function saveState(runtime: Runtime, writer: StateWriter = mongoStateWriter): Promise<void> {
    const previous = lastFlush;
    const flush = (async () => {
        try {
            await previous;
        } catch (error) {
            logger.debug(`[mongo] Previous save failed (${describeError(error)}), retrying its rows`);
        }
        await writeState(runtime, writer);
    })();
    lastFlush = flush;
    return flush;
}
