export type StakingContractData = {
    _id: string; // contract address, also the custody account in the token ledger
    tokenSymbol: string;
    owner: string;
    minStakingPeriod: number; // seconds
    rewardRatePercent: number;
    totalStaked: string;
    rewardReserve: string;
    createdAt: number;
};

export type StakeRecordData = {
    _id: string; // `${contract}_${participant}`
    contract: string;
    participant: string;
    amount: string;
    since: number; // timestamp of the last stake, in seconds
};

export interface StakingTerms {
    minStakingPeriod: number;
    rewardRatePercent: number;
}

export interface StakeRecord {
    participant: string;
    amount: bigint;
    since: number;
}

export interface StakingStakeData {
    contract: string;
    amount: string | bigint;
}

export interface StakingUnstakeData {
    contract: string;
}

export interface StakingFundRewardsData {
    contract: string;
    amount: string | bigint;
}

export interface StakingWithdrawRewardsData {
    contract: string;
    amount: string | bigint;
}

export interface StakingTransferOwnershipData {
    contract: string;
    newOwner: string;
}

export interface StakingDeployParams {
    tokenSymbol: string;
    owner: string;
    minStakingPeriod: number;
    rewardRatePercent?: number;
}
