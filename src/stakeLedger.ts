import type { TransactionExecutor, ExecutionResult } from './transaction.js';
import { StakeRecord, StakingContractData, StakingTerms } from './transactions/staking/staking-interfaces.js';
import { TransactionType } from './transactions/types.js';
import { toBigInt } from './utils/bigint.js';
import { EventDocument, EventListener, EventOfType, filterEvents, findEvents, LedgerEventType } from './utils/event-logger.js';
import { calculateReward, getStakeRecord, getStakingContract } from './utils/staking.js';

/**
 * Staking contract bound to one deployment address.
 *
 * Participants stake tokens they have approved to `address`; after `minStakingPeriod` seconds they
 * may unstake, receiving principal plus reward from the reserve the owner funds.
 */
export class StakeLedger {
    readonly address: string;

    constructor(
        private readonly executor: TransactionExecutor,
        address: string
    ) {
        this.address = address.toLowerCase();
    }

    private contract(): StakingContractData {
        const contract = getStakingContract(this.executor.cache, this.address);
        if (!contract) throw new Error(`Staking contract ${this.address} is not deployed`);
        return contract;
    }

    get tokenSymbol(): string {
        return this.contract().tokenSymbol;
    }

    stake(participant: string, amount: string | bigint): Promise<ExecutionResult> {
        return this.executor.execute({ type: TransactionType.STAKING_STAKE, sender: participant, data: { contract: this.address, amount } });
    }

    unstake(participant: string): Promise<ExecutionResult> {
        return this.executor.execute({ type: TransactionType.STAKING_UNSTAKE, sender: participant, data: { contract: this.address } });
    }

    fundRewards(sender: string, amount: string | bigint): Promise<ExecutionResult> {
        return this.executor.execute({ type: TransactionType.STAKING_FUND_REWARDS, sender, data: { contract: this.address, amount } });
    }

    withdrawRewards(sender: string, amount: string | bigint): Promise<ExecutionResult> {
        return this.executor.execute({ type: TransactionType.STAKING_WITHDRAW_REWARDS, sender, data: { contract: this.address, amount } });
    }

    transferOwnership(sender: string, newOwner: string): Promise<ExecutionResult> {
        return this.executor.execute({
            type: TransactionType.STAKING_TRANSFER_OWNERSHIP,
            sender,
            data: { contract: this.address, newOwner },
        });
    }

    /**
     * Reward the participant would receive if they unstaked now. Reads state only.
     */
    calculateReward(participant: string): bigint {
        const contract = this.contract();
        return calculateReward(getStakeRecord(this.executor.cache, this.address, participant), this.executor.clock.now(), contract);
    }

    getStake(participant: string): StakeRecord {
        return getStakeRecord(this.executor.cache, this.address, participant);
    }

    stakedAmount(participant: string): bigint {
        return this.getStake(participant).amount;
    }

    totalStaked(): bigint {
        return toBigInt(this.contract().totalStaked);
    }

    rewardReserve(): bigint {
        return toBigInt(this.contract().rewardReserve);
    }

    owner(): string {
        return this.contract().owner;
    }

    terms(): StakingTerms {
        const { minStakingPeriod, rewardRatePercent } = this.contract();
        return { minStakingPeriod, rewardRatePercent };
    }

    events(): EventDocument[];
    events<K extends LedgerEventType>(type: K): EventOfType<K>[];
    events<K extends LedgerEventType>(type?: K): EventDocument[] {
        const events = findEvents(this.executor.cache, 'staking', this.address);
        return type ? filterEvents(events, type) : events;
    }

    on<K extends LedgerEventType>(type: K, listener: EventListener<K>): () => void {
        return this.executor.events.on(type, event => {
            if (event.category === 'staking' && event.contract === this.address) listener(event);
        });
    }
}

export default StakeLedger;
