import * as stakingFundRewards from './staking/staking-fund-rewards.js';
import * as stakingStake from './staking/staking-stake.js';
import * as stakingTransferOwnership from './staking/staking-transfer-ownership.js';
import * as stakingUnstake from './staking/staking-unstake.js';
import * as stakingWithdrawRewards from './staking/staking-withdraw-rewards.js';
import * as tokenApprove from './token/token-approve.js';
import * as tokenBurn from './token/token-burn.js';
import * as tokenMint from './token/token-mint.js';
import * as tokenTransfer from './token/token-transfer.js';
import * as tokenTransferFrom from './token/token-transfer-from.js';
import { TransactionContext, TransactionDataMap, TransactionType, TxResult } from './types.js';

// Define the base transaction interface
export interface Transaction<K extends TransactionType = TransactionType> {
    type: K;
    sender: string;
    data: TransactionDataMap[K];
    id?: string; // assigned from the hash when omitted
}

// Define transaction handler interface
export interface TransactionHandler<T> {
    validate: (ctx: TransactionContext, data: T, sender: string) => Promise<TxResult>;
    process: (ctx: TransactionContext, data: T, sender: string) => Promise<TxResult>;
}

type TransactionHandlers = { [K in TransactionType]: TransactionHandler<TransactionDataMap[K]> };

const transactionHandlers: TransactionHandlers = {
    [TransactionType.TOKEN_TRANSFER]: { validate: tokenTransfer.validateTx, process: tokenTransfer.processTx },
    [TransactionType.TOKEN_APPROVE]: { validate: tokenApprove.validateTx, process: tokenApprove.processTx },
    [TransactionType.TOKEN_TRANSFER_FROM]: { validate: tokenTransferFrom.validateTx, process: tokenTransferFrom.processTx },
    [TransactionType.TOKEN_MINT]: { validate: tokenMint.validateTx, process: tokenMint.processTx },
    [TransactionType.TOKEN_BURN]: { validate: tokenBurn.validateTx, process: tokenBurn.processTx },

    [TransactionType.STAKING_STAKE]: { validate: stakingStake.validateTx, process: stakingStake.processTx },
    [TransactionType.STAKING_UNSTAKE]: { validate: stakingUnstake.validateTx, process: stakingUnstake.processTx },
    [TransactionType.STAKING_FUND_REWARDS]: { validate: stakingFundRewards.validateTx, process: stakingFundRewards.processTx },
    [TransactionType.STAKING_WITHDRAW_REWARDS]: { validate: stakingWithdrawRewards.validateTx, process: stakingWithdrawRewards.processTx },
    [TransactionType.STAKING_TRANSFER_OWNERSHIP]: {
        validate: stakingTransferOwnership.validateTx,
        process: stakingTransferOwnership.processTx,
    },
};

export function getTransactionHandler<K extends TransactionType>(type: K): TransactionHandler<TransactionDataMap[K]> | undefined {
    return transactionHandlers[type];
}

export { transactionHandlers };
