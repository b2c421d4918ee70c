import logger from '../../logger.js';
import { toBigInt, toDbString } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { getStakingContract } from '../../utils/staking.js';
import { transferBalance } from '../../utils/token.js';
import validate from '../../validation/index.js';
import { fail, ok, TransactionContext, TxResult } from '../types.js';
import { StakingWithdrawRewardsData } from './staking-interfaces.js';

export async function validateTx(ctx: TransactionContext, data: StakingWithdrawRewardsData, sender: string): Promise<TxResult> {
    try {
        const contract = getStakingContract(ctx.cache, data.contract);
        if (!contract) {
            logger.warn(`[staking-withdraw-rewards] Staking contract ${data.contract} not found.`);
            return fail('InvalidTransaction');
        }

        if (contract.owner !== sender) {
            logger.warn(`[staking-withdraw-rewards] ${sender} is not the owner of ${contract._id}.`);
            return fail('Unauthorized');
        }

        if (!validate.bigint(data.amount, false, false)) {
            logger.warn(`[staking-withdraw-rewards] Invalid amount ${data.amount}. Must be a positive integer.`);
            return fail('InvalidAmount');
        }

        // Staked principal is never withdrawable; only the reserve is
        if (toBigInt(data.amount) > toBigInt(contract.rewardReserve)) {
            logger.warn(`[staking-withdraw-rewards] ${data.amount} exceeds reserve ${toBigInt(contract.rewardReserve)}.`);
            return fail('InsufficientRewardReserve');
        }

        return ok;
    } catch (error) {
        logger.error(`[staking-withdraw-rewards] Error validating withdrawal from ${data.contract}: ${error}`);
        return fail('InternalError');
    }
}

export async function processTx(ctx: TransactionContext, data: StakingWithdrawRewardsData, sender: string): Promise<TxResult> {
    try {
        const contract = getStakingContract(ctx.cache, data.contract);
        if (!contract) return fail('InvalidTransaction');
        const amount = toBigInt(data.amount);

        ctx.cache.updateOne('contracts', contract._id, {
            $set: { rewardReserve: toDbString(toBigInt(contract.rewardReserve) - amount) },
        });
        if (!transferBalance(ctx, contract.tokenSymbol, contract._id, sender, amount)) {
            return fail('InsufficientRewardReserve');
        }
        logEvent(ctx, 'staking', contract._id, sender, { type: 'RewardsWithdrawn', data: { owner: sender, amount: amount.toString() } });

        return ok;
    } catch (error) {
        logger.error(`[staking-withdraw-rewards] Error processing withdrawal from ${data.contract}: ${error}`);
        return fail('InternalError');
    }
}
