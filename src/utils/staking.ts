import type { StateCache } from '../cache.js';
import { StakeRecord, StakeRecordData, StakingContractData, StakingTerms } from '../transactions/staking/staking-interfaces.js';
import { toBigInt } from './bigint.js';

export function stakeRecordId(contract: string, participant: string): string {
    return `${contract.toLowerCase()}_${participant.toLowerCase()}`;
}

export function getStakingContract(cache: StateCache, contract: string): StakingContractData | null {
    return cache.findOne('contracts', contract.toLowerCase());
}

export function getStakeRecordData(cache: StateCache, contract: string, participant: string): StakeRecordData | null {
    return cache.findOne('stakes', stakeRecordId(contract, participant));
}

/**
 * Participant's stake as a record; participants who never staked read as amount 0.
 */
export function getStakeRecord(cache: StateCache, contract: string, participant: string): StakeRecord {
    const data = getStakeRecordData(cache, contract, participant);
    return {
        participant: participant.toLowerCase(),
        amount: toBigInt(data?.amount),
        since: data?.since ?? 0,
    };
}

/**
 * Reward owed for a stake at `now`.
 *
 * Nothing accrues until the minimum staking period has passed; after it, the reward grows
 * linearly at `rewardRatePercent` of principal per further `minStakingPeriod`:
 *
 *   principal * rewardRatePercent * (elapsed - minStakingPeriod) / (100 * minStakingPeriod)
 *
 * Integer division rounds toward zero.
 */
export function calculateReward(stake: StakeRecord, now: number, terms: StakingTerms): bigint {
    if (stake.amount <= 0n) return 0n;
    const elapsed = now - stake.since;
    if (elapsed <= terms.minStakingPeriod) return 0n;
    const accrued = BigInt(elapsed - terms.minStakingPeriod);
    return (stake.amount * BigInt(terms.rewardRatePercent) * accrued) / (100n * BigInt(terms.minStakingPeriod));
}

export function hasMetStakingPeriod(stake: StakeRecord, now: number, terms: StakingTerms): boolean {
    return now - stake.since >= terms.minStakingPeriod;
}
