import type { StateCache } from '../cache.js';
import config from '../config.js';
import logger from '../logger.js';
import { TokenData } from '../transactions/token/token-interfaces.js';
import type { TransactionContext } from '../transactions/types.js';
import { adjustUserBalance, getAllowance, setAllowance } from './account.js';
import { toBigInt, toDbString } from './bigint.js';
import { logEvent } from './event-logger.js';

export function getToken(cache: StateCache, symbol: string): TokenData | null {
    return cache.findOne('tokens', symbol);
}

/**
 * Move `amount` of `symbol` between two accounts and log the Transfer event.
 * Returns false, leaving the debit for the caller to roll back, if either leg fails.
 */
export function transferBalance(ctx: TransactionContext, symbol: string, from: string, to: string, amount: bigint): boolean {
    const sender = from.toLowerCase();
    const recipient = to.toLowerCase();

    if (!adjustUserBalance(ctx.cache, sender, symbol, -amount, ctx.timestamp)) {
        logger.error(`[token-utils] Failed to debit ${sender} for ${amount} ${symbol}`);
        return false;
    }
    if (!adjustUserBalance(ctx.cache, recipient, symbol, amount, ctx.timestamp)) {
        logger.error(`[token-utils] Failed to credit ${recipient} for ${amount} ${symbol}`);
        return false;
    }

    logEvent(ctx, 'token', symbol, sender, { type: 'Transfer', data: { from: sender, to: recipient, value: amount.toString() } });
    return true;
}

/**
 * Move `amount` from `from` to `to` on behalf of `spender`, consuming the spender's allowance.
 * Logs Transfer, then Approval with the remaining allowance.
 */
export function transferFromBalance(
    ctx: TransactionContext,
    symbol: string,
    spender: string,
    from: string,
    to: string,
    amount: bigint
): boolean {
    const owner = from.toLowerCase();
    const operator = spender.toLowerCase();
    const remaining = getAllowance(ctx.cache, owner, operator, symbol) - amount;
    if (remaining < 0n) {
        logger.error(`[token-utils] Allowance of ${operator} over ${owner} is short by ${-remaining} ${symbol}`);
        return false;
    }

    if (!transferBalance(ctx, symbol, owner, to, amount)) {
        return false;
    }

    setAllowance(ctx.cache, owner, operator, symbol, remaining, ctx.timestamp);
    logEvent(ctx, 'token', symbol, operator, { type: 'Approval', data: { owner, spender: operator, value: remaining.toString() } });
    return true;
}

/**
 * Change a token's total supply by `delta` and credit or debit `holder` to match.
 */
export function adjustSupply(ctx: TransactionContext, token: TokenData, holder: string, delta: bigint): boolean {
    const address = holder.toLowerCase();
    if (!adjustUserBalance(ctx.cache, address, token.symbol, delta, ctx.timestamp)) {
        return false;
    }
    const newSupply = toBigInt(token.totalSupply) + delta;
    if (newSupply < 0n) {
        logger.error(`[token-utils] Supply of ${token.symbol} would become negative: ${newSupply}`);
        return false;
    }
    ctx.cache.updateOne('tokens', token._id, { $set: { totalSupply: toDbString(newSupply) } });

    const transfer =
        delta >= 0n
            ? { from: config.zeroAddress, to: address, value: delta.toString() }
            : { from: address, to: config.zeroAddress, value: (-delta).toString() };
    logEvent(ctx, 'token', token.symbol, address, { type: 'Transfer', data: transfer });
    return true;
}
