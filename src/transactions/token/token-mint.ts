import logger from '../../logger.js';
import { toBigInt } from '../../utils/bigint.js';
import { adjustSupply, getToken } from '../../utils/token.js';
import validate from '../../validation/index.js';
import { fail, ok, TransactionContext, TxResult } from '../types.js';
import { TokenMintData } from './token-interfaces.js';

export async function validateTx(ctx: TransactionContext, data: TokenMintData, sender: string): Promise<TxResult> {
    try {
        const token = getToken(ctx.cache, data.symbol);
        if (!token) {
            logger.warn(`[token-mint] Token ${data.symbol} does not exist.`);
            return fail('InvalidTransaction');
        }

        if (token.owner !== sender) {
            logger.warn(`[token-mint] ${sender} is not the owner of ${data.symbol}.`);
            return fail('Unauthorized');
        }

        if (!validate.address(data.to)) {
            logger.warn(`[token-mint] Invalid recipient ${data.to}.`);
            return fail('InvalidAddress');
        }

        if (!validate.bigint(data.amount, false, false)) {
            logger.warn(`[token-mint] Invalid amount ${data.amount}. Must be a positive integer.`);
            return fail('InvalidAmount');
        }

        // The resulting supply must stay within the storable range
        if (!validate.bigint(toBigInt(token.totalSupply) + toBigInt(data.amount), false, false)) {
            logger.warn(`[token-mint] Minting ${data.amount} would push ${data.symbol} supply past the maximum.`);
            return fail('InvalidAmount');
        }

        return ok;
    } catch (error) {
        logger.error(`[token-mint] Error validating mint: ${error}`);
        return fail('InternalError');
    }
}

export async function processTx(ctx: TransactionContext, data: TokenMintData): Promise<TxResult> {
    try {
        const token = getToken(ctx.cache, data.symbol);
        if (!token || !adjustSupply(ctx, token, data.to, toBigInt(data.amount))) {
            return fail('InternalError');
        }
        return ok;
    } catch (error) {
        logger.error(`[token-mint] Error processing mint: ${error}`);
        return fail('InternalError');
    }
}
