import { describeError, isStakingError } from '../../errors.js';
import logger from '../../logger.js';
import { getRuntime } from '../../runtime.js';
import { logTransactionEvent } from '../../utils/event-logger.js';
import validate from '../../validation/index.js';
import { TxPayload } from '../types.js';
import { CollectionWithdrawData } from './collection-interfaces.js';

function readData(data: TxPayload, sender: string): CollectionWithdrawData | undefined {
  const to = data.to ?? sender;
  if (!validate.accountName(to)) {
    logger.warn(`[collection-withdraw] Invalid recipient account name format: ${String(to)}.`);
    return undefined;
  }
  return { to };
}

export async function validateTx(data: TxPayload, sender: string, id: string): Promise<boolean> {
  try {
    if (!readData(data, sender)) return false;
    getRuntime().collection.checkWithdraw(sender);
    return true;
  } catch (error) {
    if (isStakingError(error)) {
      logger.warn(`[collection-withdraw] Rejected withdrawal by ${sender}: ${error.message}`);
    } else {
      logger.error(`[collection-withdraw] Error validating ${id}: ${describeError(error)}`);
    }
    return false;
  }
}

export async function processTx(data: TxPayload, sender: string, id: string, ts: number): Promise<boolean> {
  try {
    const withdraw = readData(data, sender);
    if (!withdraw) return false;
    const amount = getRuntime().collection.withdraw(sender, withdraw.to);

    await logTransactionEvent('collection', 'withdraw', sender, { to: withdraw.to, amount: amount.toString() }, ts, id);
    return true;
  } catch (error) {
    logger.error(`[collection-withdraw] Error processing ${id} by ${sender}: ${describeError(error)}`);
    return false;
  }
}
