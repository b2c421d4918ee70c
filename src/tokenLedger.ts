import type { TransactionExecutor, ExecutionResult } from './transaction.js';
import { TokenData } from './transactions/token/token-interfaces.js';
import { TransactionType } from './transactions/types.js';
import { getAllowance, getBalance } from './utils/account.js';
import { toBigInt } from './utils/bigint.js';
import { EventDocument, EventListener, EventOfType, filterEvents, findEvents, LedgerEventType } from './utils/event-logger.js';
import { getToken } from './utils/token.js';

/**
 * ERC20-style view and operations over one token. Every mutation goes through the executor.
 */
export class TokenLedger {
    constructor(
        private readonly executor: TransactionExecutor,
        readonly symbol: string
    ) {}

    private token(): TokenData {
        const token = getToken(this.executor.cache, this.symbol);
        if (!token) throw new Error(`Token ${this.symbol} is not deployed`);
        return token;
    }

    get name(): string {
        return this.token().name;
    }

    get decimals(): number {
        return this.token().decimals;
    }

    get owner(): string {
        return this.token().owner;
    }

    totalSupply(): bigint {
        return toBigInt(this.token().totalSupply);
    }

    balanceOf(address: string): bigint {
        return getBalance(this.executor.cache, address, this.symbol);
    }

    allowance(owner: string, spender: string): bigint {
        return getAllowance(this.executor.cache, owner, spender, this.symbol);
    }

    transfer(sender: string, to: string, amount: string | bigint): Promise<ExecutionResult> {
        return this.executor.execute({ type: TransactionType.TOKEN_TRANSFER, sender, data: { symbol: this.symbol, to, amount } });
    }

    approve(owner: string, spender: string, amount: string | bigint): Promise<ExecutionResult> {
        return this.executor.execute({ type: TransactionType.TOKEN_APPROVE, sender: owner, data: { symbol: this.symbol, spender, amount } });
    }

    transferFrom(spender: string, from: string, to: string, amount: string | bigint): Promise<ExecutionResult> {
        return this.executor.execute({
            type: TransactionType.TOKEN_TRANSFER_FROM,
            sender: spender,
            data: { symbol: this.symbol, from, to, amount },
        });
    }

    mint(sender: string, to: string, amount: string | bigint): Promise<ExecutionResult> {
        return this.executor.execute({ type: TransactionType.TOKEN_MINT, sender, data: { symbol: this.symbol, to, amount } });
    }

    burn(sender: string, amount: string | bigint): Promise<ExecutionResult> {
        return this.executor.execute({ type: TransactionType.TOKEN_BURN, sender, data: { symbol: this.symbol, amount } });
    }

    events(): EventDocument[];
    events<K extends LedgerEventType>(type: K): EventOfType<K>[];
    events<K extends LedgerEventType>(type?: K): EventDocument[] {
        const events = findEvents(this.executor.cache, 'token', this.symbol);
        return type ? filterEvents(events, type) : events;
    }

    on<K extends LedgerEventType>(type: K, listener: EventListener<K>): () => void {
        return this.executor.events.on(type, event => {
            if (event.category === 'token' && event.contract === this.symbol) listener(event);
        });
    }
}

export default TokenLedger;
