import logger from '../../logger.js';
import { getAllowance } from '../../utils/account.js';
import { toBigInt, toDbString } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { getStakingContract } from '../../utils/staking.js';
import { transferFromBalance } from '../../utils/token.js';
import validate from '../../validation/index.js';
import { fail, ok, TransactionContext, TxResult } from '../types.js';
import { StakingFundRewardsData } from './staking-interfaces.js';

export async function validateTx(ctx: TransactionContext, data: StakingFundRewardsData, sender: string): Promise<TxResult> {
    try {
        const contract = getStakingContract(ctx.cache, data.contract);
        if (!contract) {
            logger.warn(`[staking-fund-rewards] Staking contract ${data.contract} not found.`);
            return fail('InvalidTransaction');
        }

        if (contract.owner !== sender) {
            logger.warn(`[staking-fund-rewards] ${sender} is not the owner of ${contract._id}.`);
            return fail('Unauthorized');
        }

        if (!validate.bigint(data.amount, false, false)) {
            logger.warn(`[staking-fund-rewards] Invalid amount ${data.amount}. Must be a positive integer.`);
            return fail('InvalidAmount');
        }

        if (!validate.userBalances(ctx.cache, sender, [{ symbol: contract.tokenSymbol, amount: data.amount }])) {
            return fail('InsufficientBalance');
        }

        if (getAllowance(ctx.cache, sender, contract._id, contract.tokenSymbol) < toBigInt(data.amount)) {
            logger.warn(`[staking-fund-rewards] ${sender} has not approved ${data.amount} to ${contract._id}.`);
            return fail('InsufficientAllowance');
        }

        return ok;
    } catch (error) {
        logger.error(`[staking-fund-rewards] Error validating funding of ${data.contract}: ${error}`);
        return fail('InternalError');
    }
}

export async function processTx(ctx: TransactionContext, data: StakingFundRewardsData, sender: string): Promise<TxResult> {
    try {
        const contract = getStakingContract(ctx.cache, data.contract);
        if (!contract) return fail('InvalidTransaction');
        const amount = toBigInt(data.amount);

        if (!transferFromBalance(ctx, contract.tokenSymbol, contract._id, sender, contract._id, amount)) {
            return fail('InsufficientBalance');
        }

        const newReserve = toBigInt(contract.rewardReserve) + amount;
        ctx.cache.updateOne('contracts', contract._id, { $set: { rewardReserve: toDbString(newReserve) } });
        logEvent(ctx, 'staking', contract._id, sender, { type: 'RewardsFunded', data: { funder: sender, amount: amount.toString() } });
        logger.info(`[staking-fund-rewards] Reward reserve of ${contract._id} is now ${newReserve}.`);

        return ok;
    } catch (error) {
        logger.error(`[staking-fund-rewards] Error processing funding of ${data.contract}: ${error}`);
        return fail('InternalError');
    }
}
