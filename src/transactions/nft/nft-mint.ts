import logger from '../../logger.js';
import { describeError, isStakingError } from '../../errors.js';
import { getRuntime } from '../../runtime.js';
import { parseAmount } from '../../utils/bigint.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import { TxPayload } from '../types.js';
import { NFTMintData } from './nft-interfaces.js';

function readData(data: TxPayload, sender: string): NFTMintData | undefined {
  const to = data.to ?? sender;
  const quantity = data.quantity ?? 1;
  const payment = parseAmount(data.payment ?? 0);
  if (!validate.accountName(to)) {
    logger.warn(`[nft-mint] Invalid recipient account name format: ${String(to)}.`);
    return undefined;
  }
  if (!validate.integer(quantity, false, false)) {
    logger.warn('[nft-mint] Invalid quantity: must be a positive integer.');
    return undefined;
  }
  if (payment === undefined || !validate.bigint(payment, true, false)) {
    logger.warn('[nft-mint] Invalid payment: must be a non-negative integer amount.');
    return undefined;
  }
  return { to, quantity, payment };
}

export async function validateTx(data: TxPayload, sender: string, id: string, ts: number): Promise<boolean> {
  try {
    const mint = readData(data, sender);
    if (!mint) return false;
    getRuntime().collection.checkMint(mint.quantity, mint.payment);
    return true;
  } catch (error) {
    if (isStakingError(error)) {
      logger.warn(`[nft-mint] Rejected mint by ${sender} at ${ts}: ${error.message}`);
    } else {
      logger.error(`[nft-mint] Error validating mint ${id} by ${sender}: ${describeError(error)}`);
    }
    return false;
  }
}

export async function processTx(data: TxPayload, sender: string, id: string, ts: number): Promise<boolean> {
  try {
    const mint = readData(data, sender);
    if (!mint) return false;
    const minted = getRuntime().collection.mint(mint.to, mint.quantity, mint.payment, ts);

    await logTransactionEvent('nft', 'mint', sender, {
      to: mint.to,
      quantity: mint.quantity,
      firstTokenId: minted[0],
      lastTokenId: minted[minted.length - 1],
      payment: mint.payment.toString(),
    }, ts, id);
    return true;
  } catch (error) {
    logger.error(`[nft-mint] Error processing mint ${id} by ${sender}: ${describeError(error)}`);
    return false;
  }
}
