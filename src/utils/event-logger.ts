import { EventEmitter } from 'events';

import type { StateCache } from '../cache.js';
import config from '../config.js';
import logger from '../logger.js';
import { deterministicIdFrom } from './deterministic-id.js';

/**
 * Every event a ledger operation can emit, keyed by name. Amounts are decimal strings.
 */
export type LedgerEventMap = {
    Transfer: { from: string; to: string; value: string };
    Approval: { owner: string; spender: string; value: string };
    TokensStaked: { participant: string; amount: string };
    TokensUnstaked: { participant: string; principal: string; reward: string };
    RewardsFunded: { funder: string; amount: string };
    RewardsWithdrawn: { owner: string; amount: string };
    OwnershipTransferred: { previousOwner: string; newOwner: string };
};

export type LedgerEventType = keyof LedgerEventMap;

export type LedgerEvent = { [K in LedgerEventType]: { type: K; data: LedgerEventMap[K] } }[LedgerEventType];

export type EventDocument = LedgerEvent & {
    _id: string;
    category: 'token' | 'staking';
    contract: string; // token symbol or staking contract address
    actor: string;
    timestamp: number;
    transactionId: string;
    index: number; // position within the emitting transaction
};

export type EventOfType<K extends LedgerEventType> = Extract<EventDocument, { type: K }>;

export type EventListener<K extends LedgerEventType> = (event: EventOfType<K>) => void;

export function isEventOfType<K extends LedgerEventType>(event: EventDocument, type: K): event is EventOfType<K> {
    return event.type === type;
}

/**
 * Context the emitting operation runs in; the index advances per logged event.
 */
export interface EventScope {
    cache: StateCache;
    transactionId: string;
    timestamp: number;
    index: number;
}

export function eventIdFor(transactionId: string, index: number): string {
    return deterministicIdFrom([transactionId, index], config.eventIdLength);
}

/**
 * True once a transaction with this id has committed. Every committed transaction emits at least one event.
 */
export function isCommittedTransaction(cache: StateCache, transactionId: string): boolean {
    return cache.findOne('events', eventIdFor(transactionId, 0)) !== null;
}

/**
 * Record an event in the cache events collection. It is discarded if the operation rolls back.
 */
export function logEvent(
    scope: EventScope,
    category: EventDocument['category'],
    contract: string,
    actor: string,
    event: LedgerEvent
): EventDocument {
    const index = scope.index++;
    const eventId = eventIdFor(scope.transactionId, index);
    const eventDocument: EventDocument = {
        ...event,
        _id: eventId,
        category,
        contract,
        actor,
        timestamp: scope.timestamp,
        transactionId: scope.transactionId,
        index,
    };

    if (!scope.cache.insertOne('events', eventDocument)) {
        throw new Error(`Failed to log event ${event.type} (${eventId}) for actor '${actor}'`);
    }
    logger.debug(`[event-logger] ${category}:${event.type} by ${actor}: ${JSON.stringify(event.data)}`);
    return eventDocument;
}

/**
 * Fans committed events out to subscribers.
 */
export class EventBus {
    private emitter = new EventEmitter();

    on<K extends LedgerEventType>(type: K, listener: EventListener<K>): () => void {
        const handler = (event: EventDocument) => {
            if (isEventOfType(event, type)) {
                listener(event);
            }
        };
        this.emitter.on('event', handler);
        return () => {
            this.emitter.off('event', handler);
        };
    }

    onAny(listener: (event: EventDocument) => void): () => void {
        this.emitter.on('event', listener);
        return () => {
            this.emitter.off('event', listener);
        };
    }

    publish(events: EventDocument[]): void {
        const ordered = [...events].sort((a, b) => a.index - b.index);
        for (const event of ordered) {
            try {
                this.emitter.emit('event', event);
            } catch (error) {
                logger.error(`[event-logger] Listener failed for ${event.type} (${event._id}): ${error instanceof Error ? error.message : String(error)}`);
            }
        }
    }
}

/**
 * Committed events emitted under one token symbol or staking contract, in commit order.
 */
export function findEvents(cache: StateCache, category: EventDocument['category'], contract: string): EventDocument[] {
    return cache.find('events', event => event.category === category && event.contract === contract);
}

export function filterEvents<K extends LedgerEventType>(events: EventDocument[], type: K): EventOfType<K>[] {
    return events.filter((event): event is EventOfType<K> => isEventOfType(event, type));
}
