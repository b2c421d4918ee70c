import logger from '../../logger.js';
import { toBigInt, toDbString } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { calculateReward, getStakeRecord, getStakingContract, hasMetStakingPeriod, stakeRecordId } from '../../utils/staking.js';
import { transferBalance } from '../../utils/token.js';
import { fail, ok, TransactionContext, TxResult } from '../types.js';
import { StakingUnstakeData } from './staking-interfaces.js';

export async function validateTx(ctx: TransactionContext, data: StakingUnstakeData, sender: string): Promise<TxResult> {
    try {
        const contract = getStakingContract(ctx.cache, data.contract);
        if (!contract) {
            logger.warn(`[staking-unstake] Staking contract ${data.contract} not found.`);
            return fail('InvalidTransaction');
        }

        // Only an active staker may unstake, and only their own position
        const stake = getStakeRecord(ctx.cache, contract._id, sender);
        if (stake.amount === 0n) {
            logger.warn(`[staking-unstake] ${sender} has no active stake in ${contract._id}.`);
            return fail('Unauthorized');
        }

        if (!hasMetStakingPeriod(stake, ctx.timestamp, contract)) {
            logger.warn(`[staking-unstake] ${sender} staked at ${stake.since}; period of ${contract.minStakingPeriod}s not met at ${ctx.timestamp}.`);
            return fail('StakingPeriodNotMet');
        }

        const reward = calculateReward(stake, ctx.timestamp, contract);
        if (reward > toBigInt(contract.rewardReserve)) {
            logger.warn(`[staking-unstake] Reward ${reward} for ${sender} exceeds reserve ${toBigInt(contract.rewardReserve)}.`);
            return fail('InsufficientRewardReserve');
        }

        return ok;
    } catch (error) {
        logger.error(`[staking-unstake] Error validating unstake on ${data.contract} by ${sender}: ${error}`);
        return fail('InternalError');
    }
}

export async function processTx(ctx: TransactionContext, data: StakingUnstakeData, sender: string): Promise<TxResult> {
    try {
        const contract = getStakingContract(ctx.cache, data.contract);
        if (!contract) return fail('InvalidTransaction');

        const stake = getStakeRecord(ctx.cache, contract._id, sender);
        const principal = stake.amount;
        const reward = calculateReward(stake, ctx.timestamp, contract);

        ctx.cache.updateOne('stakes', stakeRecordId(contract._id, sender), { $set: { amount: toDbString(0n) } });
        ctx.cache.updateOne('contracts', contract._id, {
            $set: {
                totalStaked: toDbString(toBigInt(contract.totalStaked) - principal),
                rewardReserve: toDbString(toBigInt(contract.rewardReserve) - reward),
            },
        });

        if (!transferBalance(ctx, contract.tokenSymbol, contract._id, sender, principal + reward)) {
            logger.error(`[staking-unstake] Custody of ${contract._id} cannot pay ${principal + reward} to ${sender}.`);
            return fail('InsufficientRewardReserve');
        }

        logEvent(ctx, 'staking', contract._id, sender, {
            type: 'TokensUnstaked',
            data: { participant: sender, principal: principal.toString(), reward: reward.toString() },
        });
        logger.debug(`[staking-unstake] ${sender} unstaked ${principal} with reward ${reward} from ${contract._id}.`);

        return ok;
    } catch (error) {
        logger.error(`[staking-unstake] Error processing unstake on ${data.contract} by ${sender}: ${error}`);
        return fail('InternalError');
    }
}
