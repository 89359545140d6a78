import config from '../../config.js';
import { describeError, isStakingError } from '../../errors.js';
import logger from '../../logger.js';
import { getRuntime } from '../../runtime.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import { TxPayload } from '../types.js';
import { NFTTransferData } from './nft-interfaces.js';

function readData(data: TxPayload, sender: string): NFTTransferData | undefined {
  const { to, tokenId, memo } = data;
  const quantity = data.quantity ?? 1;
  if (!validate.tokenId(tokenId)) {
    logger.warn('[nft-transfer] Invalid data: tokenId must be a positive integer.');
    return undefined;
  }
  if (!validate.integer(quantity, false, false, config.maxTransferBatch)) {
    logger.warn(`[nft-transfer] Invalid quantity: must be between 1 and ${config.maxTransferBatch}.`);
    return undefined;
  }
  if (!validate.accountName(to)) {
    logger.warn(`[nft-transfer] Invalid recipient account name format: ${String(to)}.`);
    return undefined;
  }
  if (sender === to) {
    logger.warn('[nft-transfer] Sender and recipient cannot be the same.');
    return undefined;
  }
  if (memo !== undefined && !validate.string(memo, 256, 1)) {
    logger.warn('[nft-transfer] Invalid memo: must be a string of 1-256 chars.');
    return undefined;
  }
  return memo === undefined ? { to, tokenId, quantity } : { to, tokenId, quantity, memo };
}

export async function validateTx(data: TxPayload, sender: string, id: string, ts: number): Promise<boolean> {
  try {
    const transfer = readData(data, sender);
    if (!transfer) return false;
    getRuntime().collection.checkTransfer(sender, transfer.tokenId, transfer.quantity, ts);
    return true;
  } catch (error) {
    if (isStakingError(error)) {
      logger.warn(`[nft-transfer] Rejected transfer by ${sender}: ${error.message}`);
    } else {
      logger.error(`[nft-transfer] Error validating transfer ${id} by ${sender}: ${describeError(error)}`);
    }
    return false;
  }
}

export async function processTx(data: TxPayload, sender: string, id: string, ts: number): Promise<boolean> {
  try {
    const transfer = readData(data, sender);
    if (!transfer) return false;
    const moved = getRuntime().collection.transfer(sender, transfer.to, transfer.tokenId, transfer.quantity, ts);

    logger.debug(`[nft-transfer] Tokens ${moved.join(', ')} transferred from ${sender} to ${transfer.to}. Memo: ${transfer.memo || 'N/A'}`);
    await logTransactionEvent('nft', 'transfer', sender, {
      from: sender,
      to: transfer.to,
      firstTokenId: transfer.tokenId,
      quantity: transfer.quantity,
      memo: transfer.memo ?? null,
    }, ts, id);
    return true;
  } catch (error) {
    logger.error(`[nft-transfer] Error processing transfer ${id} by ${sender}: ${describeError(error)}`);
    return false;
  }
}
