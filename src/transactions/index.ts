import { describeError } from '../errors.js';
import logger from '../logger.js';
import { getRuntime } from '../runtime.js';
import validate from '../validation/index.js';
import * as collectionInitialize from './collection/collection-initialize.js';
import * as collectionWithdraw from './collection/collection-withdraw.js';
import * as nftMint from './nft/nft-mint.js';
import * as nftStake from './nft/nft-stake.js';
import * as nftTransfer from './nft/nft-transfer.js';
import * as nftUnstake from './nft/nft-unstake.js';
import { TransactionType, TxPayload, transactions } from './types.js';

// Define the base transaction interface
export interface Transaction {
    type: TransactionType;
    sender: string;
    data: TxPayload;
    id: string; // Unique transaction ID
    ts?: number; // Transaction time in seconds; the node clock is used when absent
}

// Define transaction handler interface
interface TransactionHandler {
    validate: (data: TxPayload, sender: string, id: string, ts: number) => Promise<boolean>;
    process: (data: TxPayload, sender: string, id: string, ts: number) => Promise<boolean>;
}

const transactionHandlers: { [key in TransactionType]: TransactionHandler } = {
    [TransactionType.NFT_MINT]: { validate: nftMint.validateTx, process: nftMint.processTx },
    [TransactionType.NFT_TRANSFER]: { validate: nftTransfer.validateTx, process: nftTransfer.processTx },
    [TransactionType.NFT_STAKE]: { validate: nftStake.validateTx, process: nftStake.processTx },
    [TransactionType.NFT_UNSTAKE]: { validate: nftUnstake.validateTx, process: nftUnstake.processTx },
    [TransactionType.COLLECTION_INITIALIZE]: { validate: collectionInitialize.validateTx, process: collectionInitialize.processTx },
    [TransactionType.COLLECTION_WITHDRAW]: { validate: collectionWithdraw.validateTx, process: collectionWithdraw.processTx },
};

export { transactionHandlers };

export function isTransactionType(value: unknown): value is TransactionType {
    return typeof value === 'number' && transactions[value] !== undefined;
}

export interface TransactionResult {
    success: boolean;
    error?: string;
}

/**
 * Validate and apply a transaction.
 * The runtime's time only moves forward once the transaction has been applied.
 *
 * @param tx The transaction to process
 * @returns Promise resolving to the result of processing
 */
export async function processTransaction(tx: Transaction): Promise<TransactionResult> {
    const runtime = getRuntime();
    try {
        if (!isTransactionType(tx.type) || !validate.accountName(tx.sender)) {
            logger.warn(`Invalid transaction: missing or malformed type/sender`);
            return { success: false, error: 'invalid transaction: missing required fields' };
        }
        const name = transactions[tx.type];
        const handler = transactionHandlers[tx.type];

        if (tx.ts !== undefined && !validate.integer(tx.ts, true, false)) {
            logger.warn(`[${name}] Invalid timestamp ${tx.ts} on ${tx.id}`);
            return { success: false, error: 'invalid transaction timestamp' };
        }
        const now = runtime.timeFor(tx.ts);

        const isValid = await handler.validate(tx.data, tx.sender, tx.id, now);
        if (!isValid) {
            logger.warn(`Transaction validation failed for ${name} (${tx.id})`);
            return { success: false, error: `invalid ${name} transaction data` };
        }

        const applied = await handler.process(tx.data, tx.sender, tx.id, now);
        if (!applied) {
            logger.error(`Transaction ${tx.id} (${name}) passed validation but could not be applied`);
            return { success: false, error: `failed to apply ${name} transaction` };
        }

        runtime.markTime(now);
        logger.debug(`Transaction applied: ${name} ${tx.id} from ${tx.sender} at ${now}`);
        return { success: true };
    } catch (error) {
        const errorMessage = describeError(error);
        logger.warn(`Transaction ${tx.id} rejected: ${errorMessage}`);
        return { success: false, error: errorMessage };
    }
}
