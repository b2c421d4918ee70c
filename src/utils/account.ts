import type { StateCache } from '../cache.js';
import logger from '../logger.js';
import { AccountData } from '../transactions/token/token-interfaces.js';
import { toBigInt, toDbString } from './bigint.js';

export function getAccount(cache: StateCache, address: string): AccountData | null {
    return cache.findOne('accounts', address.toLowerCase());
}

/**
 * Fetch the account, creating an empty one in the cache if the address was never seen.
 */
export function ensureAccount(cache: StateCache, address: string, ts: number): AccountData {
    const existing = getAccount(cache, address);
    if (existing) return existing;
    const account: AccountData = {
        _id: address.toLowerCase(),
        balances: {},
        allowances: {},
        createdAt: ts,
        lastUpdatedAt: ts,
    };
    cache.insertOne('accounts', account);
    logger.trace(`[account-utils] Created account ${account._id}`);
    return account;
}

export function getBalance(cache: StateCache, address: string, symbol: string): bigint {
    return toBigInt(getAccount(cache, address)?.balances[symbol]);
}

export function getAllowance(cache: StateCache, owner: string, spender: string, symbol: string): bigint {
    return toBigInt(getAccount(cache, owner)?.allowances[symbol]?.[spender.toLowerCase()]);
}

/**
 * Add `amount` (may be negative) to the account's balance. Refuses to go below zero.
 */
export function adjustUserBalance(cache: StateCache, address: string, symbol: string, amount: bigint, ts: number): boolean {
    const account = ensureAccount(cache, address, ts);
    const currentBalance = toBigInt(account.balances[symbol]);
    const newBalance = currentBalance + amount;

    if (newBalance < 0n) {
        logger.error(`[account-utils] Insufficient balance for ${address}: ${currentBalance} + ${amount} = ${newBalance}`);
        return false;
    }
    cache.updateOne('accounts', account._id, {
        $set: {
            balances: { ...account.balances, [symbol]: toDbString(newBalance) },
            lastUpdatedAt: ts,
        },
    });
    logger.trace(`[account-utils] Updated balance for ${address}: ${symbol} ${currentBalance} -> ${newBalance}`);
    return true;
}

export function setAllowance(cache: StateCache, owner: string, spender: string, symbol: string, amount: bigint, ts: number): void {
    const account = ensureAccount(cache, owner, ts);
    const tokenAllowances = { ...(account.allowances[symbol] || {}) };
    if (amount === 0n) {
        delete tokenAllowances[spender.toLowerCase()];
    } else {
        tokenAllowances[spender.toLowerCase()] = toDbString(amount);
    }
    cache.updateOne('accounts', account._id, {
        $set: {
            allowances: { ...account.allowances, [symbol]: tokenAllowances },
            lastUpdatedAt: ts,
        },
    });
}
