import { describeError, isStakingError } from '../../errors.js';
import logger from '../../logger.js';
import { getRuntime } from '../../runtime.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import { TxPayload } from '../types.js';
import { NFTUnstakeData } from './nft-interfaces.js';

function readData(data: TxPayload): NFTUnstakeData | undefined {
  const tokenId = data.tokenId;
  if (!validate.tokenId(tokenId)) {
    logger.warn('[nft-unstake] Invalid data: tokenId must be a positive integer.');
    return undefined;
  }
  return { tokenId };
}

export async function validateTx(data: TxPayload, sender: string, id: string, ts: number): Promise<boolean> {
  try {
    const unstake = readData(data);
    if (!unstake) return false;
    getRuntime().engine.checkUnstake(unstake.tokenId, sender, ts);
    return true;
  } catch (error) {
    if (isStakingError(error)) {
      logger.warn(`[nft-unstake] Rejected unstake by ${sender}: ${error.message}`);
    } else {
      logger.error(`[nft-unstake] Error validating unstake ${id} by ${sender}: ${describeError(error)}`);
    }
    return false;
  }
}

export async function processTx(data: TxPayload, sender: string, id: string, ts: number): Promise<boolean> {
  try {
    const unstake = readData(data);
    if (!unstake) return false;
    const engine = getRuntime().engine;
    const period = engine.unstake(unstake.tokenId, sender, ts);

    await logTransactionEvent('nft', 'unstake', sender, {
      tokenId: unstake.tokenId,
      period,
      accumulatedDuration: engine.getRecord(unstake.tokenId).accumulatedDuration,
    }, ts, id);
    return true;
  } catch (error) {
    logger.error(`[nft-unstake] Error processing unstake ${id} by ${sender}: ${describeError(error)}`);
    return false;
  }
}
