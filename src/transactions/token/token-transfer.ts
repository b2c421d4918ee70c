import logger from '../../logger.js';
import { toBigInt } from '../../utils/bigint.js';
import { getToken, transferBalance } from '../../utils/token.js';
import validate from '../../validation/index.js';
import { fail, ok, TransactionContext, TxResult } from '../types.js';
import { TokenTransferData } from './token-interfaces.js';

export async function validateTx(ctx: TransactionContext, data: TokenTransferData, sender: string): Promise<TxResult> {
    try {
        if (!getToken(ctx.cache, data.symbol)) {
            logger.warn(`[token-transfer] Token ${data.symbol} does not exist.`);
            return fail('InvalidTransaction');
        }

        if (!validate.address(data.to)) {
            logger.warn(`[token-transfer] Invalid recipient ${data.to}.`);
            return fail('InvalidAddress');
        }

        if (!validate.bigint(data.amount, false, false)) {
            logger.warn(`[token-transfer] Invalid amount ${data.amount}. Must be a positive integer.`);
            return fail('InvalidAmount');
        }

        if (!validate.userBalances(ctx.cache, sender, [{ symbol: data.symbol, amount: data.amount }])) {
            return fail('InsufficientBalance');
        }

        return ok;
    } catch (error) {
        logger.error(`[token-transfer] Error validating transfer: ${error}`);
        return fail('InternalError');
    }
}

export async function processTx(ctx: TransactionContext, data: TokenTransferData, sender: string): Promise<TxResult> {
    try {
        if (!transferBalance(ctx, data.symbol, sender, data.to, toBigInt(data.amount))) {
            return fail('InsufficientBalance');
        }
        return ok;
    } catch (error) {
        logger.error(`[token-transfer] Error processing transfer: ${error}`);
        return fail('InternalError');
    }
}
