import logger from '../../logger.js';
import { getAllowance } from '../../utils/account.js';
import { toBigInt } from '../../utils/bigint.js';
import { getToken, transferFromBalance } from '../../utils/token.js';
import validate from '../../validation/index.js';
import { fail, ok, TransactionContext, TxResult } from '../types.js';
import { TokenTransferFromData } from './token-interfaces.js';

export async function validateTx(ctx: TransactionContext, data: TokenTransferFromData, sender: string): Promise<TxResult> {
    try {
        if (!getToken(ctx.cache, data.symbol)) {
            logger.warn(`[token-transfer-from] Token ${data.symbol} does not exist.`);
            return fail('InvalidTransaction');
        }

        if (!validate.address(data.from) || !validate.address(data.to)) {
            logger.warn(`[token-transfer-from] Invalid address in transfer ${data.from} -> ${data.to}.`);
            return fail('InvalidAddress');
        }

        if (!validate.bigint(data.amount, false, false)) {
            logger.warn(`[token-transfer-from] Invalid amount ${data.amount}. Must be a positive integer.`);
            return fail('InvalidAmount');
        }

        if (!validate.userBalances(ctx.cache, data.from, [{ symbol: data.symbol, amount: data.amount }])) {
            return fail('InsufficientBalance');
        }

        const allowance = getAllowance(ctx.cache, data.from, sender, data.symbol);
        if (allowance < toBigInt(data.amount)) {
            logger.warn(`[token-transfer-from] Allowance of ${sender} over ${data.from} is ${allowance}, needs ${data.amount}.`);
            return fail('InsufficientAllowance');
        }

        return ok;
    } catch (error) {
        logger.error(`[token-transfer-from] Error validating transferFrom: ${error}`);
        return fail('InternalError');
    }
}

export async function processTx(ctx: TransactionContext, data: TokenTransferFromData, sender: string): Promise<TxResult> {
    try {
        if (!transferFromBalance(ctx, data.symbol, sender, data.from, data.to, toBigInt(data.amount))) {
            return fail('InsufficientBalance');
        }
        return ok;
    } catch (error) {
        logger.error(`[token-transfer-from] Error processing transferFrom: ${error}`);
        return fail('InternalError');
    }
}
