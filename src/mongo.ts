import { AnyBulkWriteOperation, Db, MongoClient } from 'mongodb';

import { CacheBatch, CacheDocuments, CollectionName, COLLECTIONS, PersistedState, StateCache, StateSource, StateWriter } from './cache.js';
import logger from './logger.js';
import settings from './settings.js';
import { StakeRecordData, StakingContractData } from './transactions/staking/staking-interfaces.js';
import { AccountData, TokenData } from './transactions/token/token-interfaces.js';
import { EventDocument } from './utils/event-logger.js';

export interface MongoConnection {
    client: MongoClient;
    db: Db;
}

export async function connect(url = settings.mongoUrl, dbName = settings.mongoDb): Promise<MongoConnection> {
    const client = new MongoClient(url, {});
    await client.connect();
    const db = client.db(dbName);
    logger.info(`Connected to ${url}/${db.databaseName}`);
    return { client, db };
}

export async function addMongoIndexes(db: Db): Promise<void> {
    await db.collection('stakes').createIndex({ contract: 1, participant: 1 });
    await db.collection('events').createIndex({ category: 1, contract: 1, type: 1 });
    await db.collection('events').createIndex({ transactionId: 1, index: 1 });
    logger.debug('[mongo] Indexes ensured.');
}

/**
 * Persists committed cache batches. Documents are replaced whole; events are append-only.
 */
export class MongoStateWriter implements StateWriter {
    constructor(private readonly db: Db) {}

    async write(batch: CacheBatch): Promise<void> {
        for (const collection of COLLECTIONS) {
            if (collection === 'events') {
                await this.insertEvents(batch.events);
            } else {
                await this.replaceDocuments(collection, batch[collection]);
            }
        }
    }

    private async replaceDocuments<C extends CollectionName>(collection: C, docs: CacheDocuments[C][]): Promise<void> {
        if (docs.length === 0) return;
        const operations: AnyBulkWriteOperation<{ _id: string }>[] = docs.map(doc => ({
            replaceOne: { filter: { _id: doc._id }, replacement: doc, upsert: true },
        }));
        const result = await this.db.collection<{ _id: string }>(collection).bulkWrite(operations, { ordered: true });
        logger.trace(`[mongo] ${collection}: ${result.upsertedCount} inserted, ${result.modifiedCount} updated.`);
    }

    private async insertEvents(events: EventDocument[]): Promise<void> {
        if (events.length === 0) return;
        const operations: AnyBulkWriteOperation<EventDocument>[] = events.map(event => ({ insertOne: { document: event } }));
        await this.db.collection<EventDocument>('events').bulkWrite(operations, { ordered: true });
    }
}

/**
 * Reads persisted state back for `StateCache.warmup`.
 */
export class MongoStateSource implements StateSource {
    constructor(private readonly db: Db) {}

    async readState(): Promise<PersistedState> {
        return {
            accounts: await this.db.collection<AccountData>('accounts').find({}).toArray(),
            tokens: await this.db.collection<TokenData>('tokens').find({}).toArray(),
            contracts: await this.db.collection<StakingContractData>('contracts').find({}).toArray(),
            stakes: await this.db.collection<StakeRecordData>('stakes').find({}).toArray(),
        };
    }

    async readEvents(limit: number): Promise<EventDocument[]> {
        const events = this.db.collection<EventDocument>('events');
        if (limit <= 0) {
            return events.find({}).toArray();
        }
        // Newest first for the limit, then back to insertion order
        const latest = await events.find({}).sort({ $natural: -1 }).limit(limit).toArray();
        return latest.reverse();
    }
}

/**
 * Warm the cache from MongoDB. `eventWarmup` caps how many of the latest events are held in memory (0 loads all).
 */
export async function loadState(db: Db, cache: StateCache, eventWarmup = settings.warmupEvents): Promise<void> {
    await cache.warmup(new MongoStateSource(db), eventWarmup);
}
