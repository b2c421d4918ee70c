import logger from '../../logger.js';
import { logEvent } from '../../utils/event-logger.js';
import { getStakingContract } from '../../utils/staking.js';
import validate from '../../validation/index.js';
import { fail, ok, TransactionContext, TxResult } from '../types.js';
import { StakingTransferOwnershipData } from './staking-interfaces.js';

export async function validateTx(ctx: TransactionContext, data: StakingTransferOwnershipData, sender: string): Promise<TxResult> {
    try {
        const contract = getStakingContract(ctx.cache, data.contract);
        if (!contract) {
            logger.warn(`[staking-transfer-ownership] Staking contract ${data.contract} not found.`);
            return fail('InvalidTransaction');
        }

        if (contract.owner !== sender) {
            logger.warn(`[staking-transfer-ownership] ${sender} is not the owner of ${contract._id}.`);
            return fail('Unauthorized');
        }

        if (!validate.address(data.newOwner)) {
            logger.warn(`[staking-transfer-ownership] Invalid new owner ${data.newOwner}.`);
            return fail('InvalidAddress');
        }

        return ok;
    } catch (error) {
        logger.error(`[staking-transfer-ownership] Error validating ownership transfer of ${data.contract}: ${error}`);
        return fail('InternalError');
    }
}

export async function processTx(ctx: TransactionContext, data: StakingTransferOwnershipData, sender: string): Promise<TxResult> {
    try {
        const contract = getStakingContract(ctx.cache, data.contract);
        if (!contract) return fail('InvalidTransaction');
        const newOwner = data.newOwner.toLowerCase();

        ctx.cache.updateOne('contracts', contract._id, { $set: { owner: newOwner } });
        logEvent(ctx, 'staking', contract._id, sender, {
            type: 'OwnershipTransferred',
            data: { previousOwner: contract.owner, newOwner },
        });
        logger.info(`[staking-transfer-ownership] ${contract._id} ownership moved from ${contract.owner} to ${newOwner}.`);

        return ok;
    } catch (error) {
        logger.error(`[staking-transfer-ownership] Error processing ownership transfer of ${data.contract}: ${error}`);
        return fail('InternalError');
    }
}
