import logger from '../../logger.js';
import { setAllowance } from '../../utils/account.js';
import { toBigInt } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { getToken } from '../../utils/token.js';
import validate from '../../validation/index.js';
import { fail, ok, TransactionContext, TxResult } from '../types.js';
import { TokenApproveData } from './token-interfaces.js';

export async function validateTx(ctx: TransactionContext, data: TokenApproveData, sender: string): Promise<TxResult> {
    try {
        if (!getToken(ctx.cache, data.symbol)) {
            logger.warn(`[token-approve] Token ${data.symbol} does not exist.`);
            return fail('InvalidTransaction');
        }

        if (!validate.address(data.spender)) {
            logger.warn(`[token-approve] Invalid spender ${data.spender}.`);
            return fail('InvalidAddress');
        }

        // Zero is a valid allowance: it revokes
        if (!validate.bigint(data.amount, true, false)) {
            logger.warn(`[token-approve] Invalid amount ${data.amount} approved by ${sender}.`);
            return fail('InvalidAmount');
        }

        return ok;
    } catch (error) {
        logger.error(`[token-approve] Error validating approval: ${error}`);
        return fail('InternalError');
    }
}

export async function processTx(ctx: TransactionContext, data: TokenApproveData, sender: string): Promise<TxResult> {
    try {
        const amount = toBigInt(data.amount);
        const spender = data.spender.toLowerCase();
        setAllowance(ctx.cache, sender, spender, data.symbol, amount, ctx.timestamp);
        logEvent(ctx, 'token', data.symbol, sender, {
            type: 'Approval',
            data: { owner: sender, spender, value: amount.toString() },
        });
        return ok;
    } catch (error) {
        logger.error(`[token-approve] Error processing approval: ${error}`);
        return fail('InternalError');
    }
}
