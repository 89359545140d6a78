import { describeError, isStakingError } from '../../errors.js';
import logger from '../../logger.js';
import { getRuntime } from '../../runtime.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import { TxPayload } from '../types.js';
import { NFTStakeData } from './nft-interfaces.js';

function readData(data: TxPayload): NFTStakeData | undefined {
  const tokenId = data.tokenId;
  if (!validate.tokenId(tokenId)) {
    logger.warn('[nft-stake] Invalid data: tokenId must be a positive integer.');
    return undefined;
  }
  return { tokenId };
}

export async function validateTx(data: TxPayload, sender: string, id: string, ts: number): Promise<boolean> {
  try {
    const stake = readData(data);
    if (!stake) return false;
    getRuntime().engine.checkStake(stake.tokenId, sender, ts);
    return true;
  } catch (error) {
    if (isStakingError(error)) {
      logger.warn(`[nft-stake] Rejected stake by ${sender}: ${error.message}`);
    } else {
      logger.error(`[nft-stake] Error validating stake ${id} by ${sender}: ${describeError(error)}`);
    }
    return false;
  }
}

export async function processTx(data: TxPayload, sender: string, id: string, ts: number): Promise<boolean> {
  try {
    const stake = readData(data);
    if (!stake) return false;
    const record = getRuntime().engine.stake(stake.tokenId, sender, ts);

    await logTransactionEvent('nft', 'stake', sender, {
      tokenId: stake.tokenId,
      stakedAt: record.lastStakedAt,
      firstStakedAt: record.firstStakedAt ?? null,
    }, ts, id);
    return true;
  } catch (error) {
    logger.error(`[nft-stake] Error processing stake ${id} by ${sender}: ${describeError(error)}`);
    return false;
  }
}
