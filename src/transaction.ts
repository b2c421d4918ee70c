import CryptoJS from 'crypto-js';

import type { StateCache } from './cache.js';
import type { Clock } from './clock.js';
import logger from './logger.js';
import ProcessingQueue from './processingQueue.js';
import { getTransactionHandler, Transaction } from './transactions/index.js';
import { fail, TransactionContext, transactions, TransactionType, TxResult } from './transactions/types.js';
import { bigintReplacer } from './utils/bigint.js';
import { EventBus, EventDocument, isCommittedTransaction } from './utils/event-logger.js';
import { getStakingContract } from './utils/staking.js';
import validate from './validation/index.js';

export type ExecutionResult = TxResult & {
    id: string;
    timestamp: number;
    events: EventDocument[];
};

/**
 * Runs transactions against a StateCache one at a time.
 *
 * Each transaction is all-or-nothing: if validation or processing fails, or a handler throws,
 * the cache is rolled back and no event is published. Committed events are published after commit.
 */
export class TransactionExecutor {
    readonly events = new EventBus();
    private readonly queue = new ProcessingQueue();
    private nonce = 0;

    constructor(
        readonly cache: StateCache,
        readonly clock: Clock
    ) {}

    createHash(tx: Transaction, ts: number, nonce: number): string {
        return CryptoJS.SHA256(
            JSON.stringify(
                {
                    type: tx.type,
                    data: tx.data,
                    sender: tx.sender,
                    ts,
                    nonce,
                },
                bigintReplacer
            )
        ).toString();
    }

    /**
     * Hash the transaction, bumping the nonce past ids already committed to this cache by other executors.
     */
    private uniqueHash(tx: Transaction, ts: number): string {
        let id = this.createHash(tx, ts, this.nonce++);
        while (isCommittedTransaction(this.cache, id)) {
            id = this.createHash(tx, ts, this.nonce++);
        }
        return id;
    }

    execute<K extends TransactionType>(tx: Transaction<K>): Promise<ExecutionResult> {
        return this.queue.run(() => this.executeNow(tx));
    }

    private async executeNow<K extends TransactionType>(tx: Transaction<K>): Promise<ExecutionResult> {
        const timestamp = this.clock.now();

        if (this.cache.isDirty()) {
            logger.warn(`[transaction] Discarding uncommitted writes found before ${tx.id || 'next transaction'}.`);
            this.cache.rollback();
        }

        if (tx.id && isCommittedTransaction(this.cache, tx.id)) {
            logger.warn(`[transaction] Transaction id ${tx.id} was already committed.`);
            return { ...fail('InvalidTransaction'), id: tx.id, timestamp, events: [] };
        }
        const id = tx.id || this.uniqueHash(tx, timestamp);

        const handler = getTransactionHandler(tx.type);
        if (!handler || typeof tx.data !== 'object' || tx.data === null) {
            logger.warn(`[transaction] Unknown type or missing data in ${id}: type=${tx.type}`);
            return { ...fail('InvalidTransaction'), id, timestamp, events: [] };
        }
        if (!validate.address(tx.sender)) {
            logger.warn(`[transaction] Invalid sender in ${id}.`);
            return { ...fail('InvalidAddress'), id, timestamp, events: [] };
        }
        const sender = tx.sender.toLowerCase();
        // Contract addresses hold custody; nothing may be sent on their behalf
        if (getStakingContract(this.cache, sender)) {
            logger.warn(`[transaction] Sender ${sender} is a staking contract.`);
            return { ...fail('Unauthorized'), id, timestamp, events: [] };
        }
        const ctx: TransactionContext = { cache: this.cache, transactionId: id, timestamp, index: 0 };

        let result: TxResult;
        try {
            result = await handler.validate(ctx, tx.data, sender);
            if (result.valid) {
                result = await handler.process(ctx, tx.data, sender);
            }
        } catch (error) {
            logger.error(`[transaction] ${transactions[tx.type]} ${id} threw: ${error instanceof Error ? error.message : String(error)}`);
            result = fail('InternalError');
        }

        if (!result.valid) {
            this.cache.rollback();
            logger.warn(`[transaction] ${transactions[tx.type]} from ${sender} rejected: ${result.error}`);
            return { ...result, id, timestamp, events: [] };
        }

        const batch = this.cache.commit();
        logger.debug(`[transaction] ${transactions[tx.type]} ${id} from ${sender} committed with ${batch.events.length} event(s).`);
        this.events.publish(batch.events);
        return { ...result, id, timestamp, events: batch.events };
    }
}

export default TransactionExecutor;
