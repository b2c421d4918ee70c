import logger from '../../logger.js';
import { getAllowance } from '../../utils/account.js';
import { toBigInt, toDbString } from '../../utils/bigint.js';
import { logEvent } from '../../utils/event-logger.js';
import { getStakeRecordData, getStakingContract, stakeRecordId } from '../../utils/staking.js';
import { transferFromBalance } from '../../utils/token.js';
import validate from '../../validation/index.js';
import { fail, ok, TransactionContext, TxResult } from '../types.js';
import { StakingStakeData } from './staking-interfaces.js';

export async function validateTx(ctx: TransactionContext, data: StakingStakeData, sender: string): Promise<TxResult> {
    try {
        const contract = getStakingContract(ctx.cache, data.contract);
        if (!contract) {
            logger.warn(`[staking-stake] Staking contract ${data.contract} not found.`);
            return fail('InvalidTransaction');
        }

        if (!validate.bigint(data.amount, false, false)) {
            logger.warn(`[staking-stake] Invalid amount ${data.amount} from ${sender}. Must be a positive integer.`);
            return fail('InvalidAmount');
        }

        if (!validate.userBalances(ctx.cache, sender, [{ symbol: contract.tokenSymbol, amount: data.amount }])) {
            logger.warn(`[staking-stake] Staker ${sender} has insufficient balance of ${contract.tokenSymbol}.`);
            return fail('InsufficientBalance');
        }

        const allowance = getAllowance(ctx.cache, sender, contract._id, contract.tokenSymbol);
        if (allowance < toBigInt(data.amount)) {
            logger.warn(`[staking-stake] Staker ${sender} approved ${allowance} to ${contract._id}, needs ${data.amount}.`);
            return fail('InsufficientAllowance');
        }

        return ok;
    } catch (error) {
        logger.error(`[staking-stake] Error validating stake on ${data.contract} by ${sender}: ${error}`);
        return fail('InternalError');
    }
}

export async function processTx(ctx: TransactionContext, data: StakingStakeData, sender: string): Promise<TxResult> {
    try {
        const contract = getStakingContract(ctx.cache, data.contract);
        if (!contract) return fail('InvalidTransaction');
        const amount = toBigInt(data.amount);

        // Custody: the contract pulls the tokens using the allowance granted to it
        if (!transferFromBalance(ctx, contract.tokenSymbol, contract._id, sender, contract._id, amount)) {
            logger.error(`[staking-stake] Failed to move ${amount} ${contract.tokenSymbol} from ${sender} into custody.`);
            return fail('InsufficientBalance');
        }

        const existing = getStakeRecordData(ctx.cache, contract._id, sender);
        const newAmount = toBigInt(existing?.amount) + amount;
        ctx.cache.upsertOne('stakes', {
            _id: stakeRecordId(contract._id, sender),
            contract: contract._id,
            participant: sender,
            amount: toDbString(newAmount),
            since: ctx.timestamp,
        });

        const newTotalStaked = toBigInt(contract.totalStaked) + amount;
        ctx.cache.updateOne('contracts', contract._id, { $set: { totalStaked: toDbString(newTotalStaked) } });

        logEvent(ctx, 'staking', contract._id, sender, {
            type: 'TokensStaked',
            data: { participant: sender, amount: amount.toString() },
        });
        logger.debug(`[staking-stake] ${sender} staked ${amount} ${contract.tokenSymbol}; position ${newAmount}, total ${newTotalStaked}.`);

        return ok;
    } catch (error) {
        logger.error(`[staking-stake] Error processing stake on ${data.contract} by ${sender}: ${error}`);
        return fail('InternalError');
    }
}
