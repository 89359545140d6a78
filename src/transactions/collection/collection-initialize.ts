import { describeError, isStakingError } from '../../errors.js';
import logger from '../../logger.js';
import { getRuntime } from '../../runtime.js';
import { parseCollectionConfig } from '../../staking/config-store.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import { TxPayload } from '../types.js';
import { CollectionInitializeData } from './collection-interfaces.js';

function readData(data: TxPayload): CollectionInitializeData | undefined {
  try {
    return { config: parseCollectionConfig(data.config) };
  } catch (error) {
    logger.warn(`[collection-initialize] Invalid configuration: ${describeError(error)}`);
    return undefined;
  }
}

export async function validateTx(data: TxPayload, sender: string, id: string): Promise<boolean> {
  const store = getRuntime().config;
  if (sender !== store.admin) {
    logger.warn(`[collection-initialize] ${sender} is not the collection administrator.`);
    return false;
  }
  if (store.isInitialized) {
    logger.warn(`[collection-initialize] Collection is already initialized, ignoring ${id}.`);
    return false;
  }
  return readData(data) !== undefined;
}

export async function processTx(data: TxPayload, sender: string, id: string, ts: number): Promise<boolean> {
  try {
    const initialize = readData(data);
    if (!initialize) return false;
    const store = getRuntime().config;
    store.initialize(initialize.config, sender);

    const { symbol, maxSupply, mintPrice, staking } = store.get();
    await logTransactionEvent('collection', 'initialize', sender, {
      symbol,
      maxSupply,
      mintPrice: mintPrice.toString(),
      minStakingTime: staking.minStakingTime,
      automaticStakeOnMint: staking.automaticStakeOnMint,
      automaticStakeOnTransfer: staking.automaticStakeOnTransfer,
    }, ts, id);
    return true;
  } catch (error) {
    if (isStakingError(error)) {
      logger.warn(`[collection-initialize] Rejected initialization by ${sender}: ${error.message}`);
    } else {
      logger.error(`[collection-initialize] Error processing ${id}: ${describeError(error)}`);
    }
    return false;
  }
}
