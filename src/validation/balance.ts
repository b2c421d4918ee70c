import type { StateCache } from '../cache.js';
import logger from '../logger.js';
import { getBalance } from '../utils/account.js';
import { toBigInt } from '../utils/bigint.js';

/**
 * Validates that the user has sufficient balances for one or more tokens.
 * @param cache Ledger state to read balances from
 * @param user Account address
 * @param requirements Array of { symbol, amount } objects
 * @returns True if all balances are sufficient, false otherwise
 */
export const userBalances = (
    cache: StateCache,
    user: string,
    requirements: Array<{ symbol: string; amount: string | bigint }>
): boolean => {
    for (const req of requirements) {
        const balance = getBalance(cache, user, req.symbol);
        if (balance < toBigInt(req.amount)) {
            logger.warn(`[balance-validation] Insufficient balance for ${user} in ${req.symbol}. Required: ${req.amount}, Available: ${balance}`);
            return false;
        }
    }
    return true;
};

export default userBalances;
