import type { EventScope } from '../utils/event-logger.js';
import {
    StakingFundRewardsData,
    StakingStakeData,
    StakingTransferOwnershipData,
    StakingUnstakeData,
    StakingWithdrawRewardsData,
} from './staking/staking-interfaces.js';
import { TokenApproveData, TokenBurnData, TokenMintData, TokenTransferData, TokenTransferFromData } from './token/token-interfaces.js';

export enum TransactionType {
    // Token Transactions
    TOKEN_TRANSFER = 1,
    TOKEN_APPROVE = 2,
    TOKEN_TRANSFER_FROM = 3,
    TOKEN_MINT = 4,
    TOKEN_BURN = 5,

    // Staking Transactions
    STAKING_STAKE = 10,
    STAKING_UNSTAKE = 11,
    STAKING_FUND_REWARDS = 12,
    STAKING_WITHDRAW_REWARDS = 13,
    STAKING_TRANSFER_OWNERSHIP = 14,
}

export const transactions: { [key in TransactionType]: string } = {
    [TransactionType.TOKEN_TRANSFER]: 'token_transfer',
    [TransactionType.TOKEN_APPROVE]: 'token_approve',
    [TransactionType.TOKEN_TRANSFER_FROM]: 'token_transfer_from',
    [TransactionType.TOKEN_MINT]: 'token_mint',
    [TransactionType.TOKEN_BURN]: 'token_burn',

    [TransactionType.STAKING_STAKE]: 'staking_stake',
    [TransactionType.STAKING_UNSTAKE]: 'staking_unstake',
    [TransactionType.STAKING_FUND_REWARDS]: 'staking_fund_rewards',
    [TransactionType.STAKING_WITHDRAW_REWARDS]: 'staking_withdraw_rewards',
    [TransactionType.STAKING_TRANSFER_OWNERSHIP]: 'staking_transfer_ownership',
};

export type TransactionDataMap = {
    [TransactionType.TOKEN_TRANSFER]: TokenTransferData;
    [TransactionType.TOKEN_APPROVE]: TokenApproveData;
    [TransactionType.TOKEN_TRANSFER_FROM]: TokenTransferFromData;
    [TransactionType.TOKEN_MINT]: TokenMintData;
    [TransactionType.TOKEN_BURN]: TokenBurnData;
    [TransactionType.STAKING_STAKE]: StakingStakeData;
    [TransactionType.STAKING_UNSTAKE]: StakingUnstakeData;
    [TransactionType.STAKING_FUND_REWARDS]: StakingFundRewardsData;
    [TransactionType.STAKING_WITHDRAW_REWARDS]: StakingWithdrawRewardsData;
    [TransactionType.STAKING_TRANSFER_OWNERSHIP]: StakingTransferOwnershipData;
};

export const LEDGER_ERRORS = [
    'InvalidAmount',
    'InsufficientBalance',
    'InsufficientAllowance',
    'StakingPeriodNotMet',
    'InsufficientRewardReserve',
    'Unauthorized',
    'InvalidAddress',
    'InvalidTransaction',
    'InternalError',
] as const;

export type LedgerError = (typeof LEDGER_ERRORS)[number];

export type TxResult = { valid: true } | { valid: false; error: LedgerError };

export const ok: TxResult = { valid: true };

export function fail(error: LedgerError): TxResult {
    return { valid: false, error };
}

/**
 * What a handler sees of the transaction it runs in: ledger state plus the event scope.
 */
export type TransactionContext = EventScope;
