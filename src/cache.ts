import cloneDeep from 'clone-deep';

import logger from './logger.js';
import ProcessingQueue from './processingQueue.js';
import { StakeRecordData, StakingContractData } from './transactions/staking/staking-interfaces.js';
import { AccountData, TokenData } from './transactions/token/token-interfaces.js';
import { setTokenDecimals } from './utils/bigint.js';
import { EventDocument } from './utils/event-logger.js';

export type CacheDocuments = {
    accounts: AccountData;
    tokens: TokenData;
    contracts: StakingContractData;
    stakes: StakeRecordData;
    events: EventDocument;
};

export type CollectionName = keyof CacheDocuments;

export const COLLECTIONS: readonly CollectionName[] = ['accounts', 'tokens', 'contracts', 'stakes', 'events'];

type CollectionStores = { [C in CollectionName]: Map<string, CacheDocuments[C]> };
// null marks a document that did not exist before the current operation
type CopyStores = { [C in CollectionName]: Map<string, CacheDocuments[C] | null> };

export type UpdateChanges<C extends CollectionName> = {
    $set: Partial<Omit<CacheDocuments[C], '_id'>>;
};

/**
 * Documents touched by one committed operation, grouped by collection.
 * Events are append-only; every other collection is written as a full replacement.
 */
export type CacheBatch = { [C in CollectionName]: CacheDocuments[C][] };

/**
 * Destination of committed batches, e.g. MongoDB.
 */
export interface StateWriter {
    write(batch: CacheBatch): Promise<void>;
}

export type PersistedState = Omit<CacheBatch, 'events'>;

/**
 * Origin of persisted state, e.g. MongoDB.
 */
export interface StateSource {
    readState(): Promise<PersistedState>;
    /** The latest `limit` events (all when `limit` is 0), oldest first. */
    readEvents(limit: number): Promise<EventDocument[]>;
}

function emptyStores(): CollectionStores {
    return { accounts: new Map(), tokens: new Map(), contracts: new Map(), stakes: new Map(), events: new Map() };
}

function emptyCopies(): CopyStores {
    return { accounts: new Map(), tokens: new Map(), contracts: new Map(), stakes: new Map(), events: new Map() };
}

/**
 * In-memory ledger state with copy-on-write rollback.
 *
 * The first write to a document within an operation snapshots its previous value.
 * `rollback()` restores every snapshot and drops inserted documents; `commit()` clears the
 * snapshots and hands the touched documents to the writer, if one is attached.
 */
export class StateCache {
    private live: CollectionStores = emptyStores();
    private copy: CopyStores = emptyCopies();
    private writer: StateWriter | null = null;
    readonly writerQueue = new ProcessingQueue();

    setWriter(writer: StateWriter | null): void {
        this.writer = writer;
    }

    findOne<C extends CollectionName>(collection: C, id: string): CacheDocuments[C] | null {
        const doc = this.live[collection].get(id);
        return doc ? cloneDeep(doc) : null;
    }

    find<C extends CollectionName>(collection: C, predicate?: (doc: CacheDocuments[C]) => boolean): CacheDocuments[C][] {
        const results: CacheDocuments[C][] = [];
        for (const doc of this.live[collection].values()) {
            if (!predicate || predicate(doc)) results.push(cloneDeep(doc));
        }
        return results;
    }

    count(collection: CollectionName): number {
        return this.live[collection].size;
    }

    insertOne<C extends CollectionName>(collection: C, document: CacheDocuments[C]): boolean {
        const store = this.live[collection];
        if (store.has(document._id)) {
            logger.warn(`[CACHE insertOne] Document ${collection}/${document._id} already exists.`);
            return false;
        }
        this.snapshot(collection, document._id);
        store.set(document._id, cloneDeep(document));
        return true;
    }

    updateOne<C extends CollectionName>(collection: C, id: string, changes: UpdateChanges<C>): boolean {
        const store = this.live[collection];
        const current = store.get(id);
        if (!current) {
            logger.warn(`[CACHE updateOne] Document ${collection}/${id} not found.`);
            return false;
        }
        this.snapshot(collection, id);
        store.set(id, { ...current, ...cloneDeep(changes.$set) });
        return true;
    }

    /**
     * Insert the document, or replace it if a document with the same id exists.
     */
    upsertOne<C extends CollectionName>(collection: C, document: CacheDocuments[C]): void {
        this.snapshot(collection, document._id);
        this.live[collection].set(document._id, cloneDeep(document));
    }

    /**
     * True while the current operation has uncommitted writes.
     */
    isDirty(): boolean {
        return COLLECTIONS.some(collection => this.copy[collection].size > 0);
    }

    rollback(): void {
        for (const collection of COLLECTIONS) {
            this.restore(collection);
        }
    }

    /**
     * Accept the current operation's writes and queue them for the writer.
     */
    commit(): CacheBatch {
        const batch: CacheBatch = { accounts: [], tokens: [], contracts: [], stakes: [], events: [] };
        for (const collection of COLLECTIONS) {
            this.collect(collection, batch[collection]);
        }
        this.copy = emptyCopies();
        this.writeToDisk(batch);
        return batch;
    }

    /**
     * Replace a collection's contents with documents read from storage. Not rolled back.
     */
    load<C extends CollectionName>(collection: C, documents: CacheDocuments[C][]): void {
        const store = this.live[collection];
        store.clear();
        for (const doc of documents) {
            store.set(doc._id, doc);
        }
        logger.debug(`[CACHE load] Loaded ${documents.length} ${collection} documents.`);
    }

    /**
     * Replace every collection with persisted state and register token decimals.
     * Only the latest `eventWarmup` events are kept in memory when it is positive.
     */
    async warmup(source: StateSource, eventWarmup = 0): Promise<void> {
        const timeStart = Date.now();
        const state = await source.readState();
        this.load('accounts', state.accounts);
        this.load('tokens', state.tokens);
        this.load('contracts', state.contracts);
        this.load('stakes', state.stakes);
        this.load('events', await source.readEvents(eventWarmup));
        for (const token of state.tokens) {
            setTokenDecimals(token.symbol, token.decimals);
        }
        logger.info(`[CACHE warmup] Loaded ${COLLECTIONS.map(c => `${this.count(c)} ${c}`).join(', ')} in ${Date.now() - timeStart}ms.`);
    }

    clear(): void {
        this.live = emptyStores();
        this.copy = emptyCopies();
    }

    /**
     * Resolves once every queued write has been attempted.
     */
    flush(): Promise<void> {
        return this.writerQueue.onIdle();
    }

    private writeToDisk(batch: CacheBatch): void {
        const writer = this.writer;
        if (!writer) return;
        const numOps = COLLECTIONS.reduce((total, collection) => total + batch[collection].length, 0);
        if (numOps === 0) return;

        this.writerQueue.push(done => {
            const timeBefore = Date.now();
            writer.write(batch).then(
                () => {
                    logger.debug(`[CACHE writeToDisk] Batch of ${numOps} ops took ${Date.now() - timeBefore}ms.`);
                    done(null);
                },
                (err: unknown) => {
                    logger.error(`[CACHE writeToDisk] Batch of ${numOps} ops failed: ${err instanceof Error ? err.message : String(err)}`);
                    done(err instanceof Error ? err : new Error(String(err)));
                }
            );
        });
    }

    private snapshot<C extends CollectionName>(collection: C, id: string): void {
        const copies = this.copy[collection];
        if (copies.has(id)) return;
        const existing = this.live[collection].get(id);
        copies.set(id, existing ? cloneDeep(existing) : null);
    }

    private restore<C extends CollectionName>(collection: C): void {
        const store = this.live[collection];
        for (const [id, previous] of this.copy[collection]) {
            if (previous === null) {
                store.delete(id);
            } else {
                store.set(id, previous);
            }
        }
        this.copy[collection].clear();
    }

    private collect<C extends CollectionName>(collection: C, out: CacheDocuments[C][]): void {
        const store = this.live[collection];
        for (const id of this.copy[collection].keys()) {
            const doc = store.get(id);
            if (doc) out.push(cloneDeep(doc));
        }
    }
}

export default StateCache;
