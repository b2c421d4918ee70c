import { CacheBatch, StateCache, StateWriter } from '../src/cache.js';
import { ManualClock } from '../src/clock.js';
import { initialize, LedgerDeployment } from '../src/initialize.js';

export const OWNER = '0x' + '1'.repeat(40);
export const ALICE = '0x' + 'a'.repeat(40);
export const BOB = '0x' + 'b'.repeat(40);
export const CAROL = '0x' + 'c'.repeat(40);

export const START_TIME = 1_700_000_000;
export const PERIOD = 604_800;

/**
 * In-process stand-in for MongoDB: keeps every committed batch.
 */
export class MemoryWriter implements StateWriter {
    batches: CacheBatch[] = [];

    async write(batch: CacheBatch): Promise<void> {
        this.batches.push(batch);
    }
}

export type TestLedger = LedgerDeployment & { clock: ManualClock; writer: MemoryWriter };

/**
 * Fresh deployment: OWNER holds 1,000,000 units (0 decimals), 7-day period, 10% rate.
 */
export function setupLedger(): TestLedger {
    const clock = new ManualClock(START_TIME);
    const writer = new MemoryWriter();
    const deployment = initialize({
        cache: new StateCache(),
        clock,
        owner: OWNER,
        writer,
        token: { initialSupply: 1_000_000n, decimals: 0 },
        staking: { minStakingPeriod: PERIOD, rewardRatePercent: 10 },
    });
    return { ...deployment, clock, writer };
}

/**
 * Give `participant` `amount` tokens from OWNER and approve the staking contract for `allowance`.
 */
export async function fundParticipant(ledger: TestLedger, participant: string, amount: bigint, allowance = amount): Promise<void> {
    const transfer = await ledger.token.transfer(OWNER, participant, amount);
    if (!transfer.valid) throw new Error(`fixture transfer failed: ${transfer.error}`);
    const approval = await ledger.token.approve(participant, ledger.staking.address, allowance);
    if (!approval.valid) throw new Error(`fixture approval failed: ${approval.error}`);
}
