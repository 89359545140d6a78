import config from '../config.js';
import logger from '../logger.js';
import { getRuntime } from '../runtime.js';
import { deterministicIdFrom } from './deterministic-id.js';

export type EventValue = string | number | boolean | null;

/**
 * Represents the structure of an event document to be stored.
 */
export interface EventDocument {
    _id: string;
    category: string; // High-level category: 'nft', 'collection'
    action: string; // Specific action: 'mint', 'stake', 'unstake', ...
    type: string; // category_action
    timestamp: number; // transaction time, in seconds
    actor: string;
    data: Record<string, EventValue>;
    transactionId?: string;
}

/**
 * Records a transaction event on the current runtime.
 * Only the most recent events are kept in memory; older ones live in the node logs.
 *
 * @param category - High-level category ('nft', 'collection')
 * @param action - Specific action ('mint', 'transfer', 'stake', ...)
 * @param actor - The account that sent the transaction
 * @param eventData - The specific data associated with the event
 * @param timestamp - Transaction time in seconds
 * @param transactionId - Optional: id of the originating transaction
 */
export async function logTransactionEvent(
    category: string,
    action: string,
    actor: string,
    eventData: Record<string, EventValue>,
    timestamp: number,
    transactionId?: string
): Promise<EventDocument> {
    const runtime = getRuntime();
    const eventDocument: EventDocument = {
        _id: deterministicIdFrom([category, action, actor, transactionId || '', timestamp, runtime.nextEventSequence()], 24),
        category,
        action,
        type: `${category}_${action}`,
        timestamp,
        actor,
        data: eventData,
    };
    if (transactionId) {
        eventDocument.transactionId = transactionId;
    }

    runtime.events.push(eventDocument);
    if (runtime.events.length > config.recentEventsLimit) {
        runtime.events.splice(0, runtime.events.length - config.recentEventsLimit);
    }
    logger.debug(`[event-logger] Event logged: Category: ${category}, Action: ${action}, Actor: ${actor}, EventID: ${eventDocument._id}`);
    return eventDocument;
}
