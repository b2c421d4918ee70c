import logger from '../../logger.js';
import { toBigInt } from '../../utils/bigint.js';
import { adjustSupply, getToken } from '../../utils/token.js';
import validate from '../../validation/index.js';
import { fail, ok, TransactionContext, TxResult } from '../types.js';
import { TokenBurnData } from './token-interfaces.js';

export async function validateTx(ctx: TransactionContext, data: TokenBurnData, sender: string): Promise<TxResult> {
    try {
        if (!getToken(ctx.cache, data.symbol)) {
            logger.warn(`[token-burn] Token ${data.symbol} does not exist.`);
            return fail('InvalidTransaction');
        }

        if (!validate.bigint(data.amount, false, false)) {
            logger.warn(`[token-burn] Invalid amount ${data.amount}. Must be a positive integer.`);
            return fail('InvalidAmount');
        }

        if (!validate.userBalances(ctx.cache, sender, [{ symbol: data.symbol, amount: data.amount }])) {
            return fail('InsufficientBalance');
        }

        return ok;
    } catch (error) {
        logger.error(`[token-burn] Error validating burn: ${error}`);
        return fail('InternalError');
    }
}

export async function processTx(ctx: TransactionContext, data: TokenBurnData, sender: string): Promise<TxResult> {
    try {
        const token = getToken(ctx.cache, data.symbol);
        if (!token || !adjustSupply(ctx, token, sender, -toBigInt(data.amount))) {
            return fail('InsufficientBalance');
        }
        return ok;
    } catch (error) {
        logger.error(`[token-burn] Error processing burn: ${error}`);
        return fail('InternalError');
    }
}
