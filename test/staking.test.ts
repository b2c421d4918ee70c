import assert from 'assert';
import { beforeEach, describe, it } from 'node:test';

import { toDbString } from '../src/utils/bigint.js';
import { EventOfType } from '../src/utils/event-logger.js';
import { stakeRecordId } from '../src/utils/staking.js';
import { ALICE, BOB, CAROL, fundParticipant, OWNER, PERIOD, setupLedger, TestLedger } from './fixtures.js';

function assertCustody(ledger: TestLedger): void {
    const { cache, staking, token } = ledger;
    const recorded = cache.find('stakes', doc => doc.contract === staking.address).reduce((sum, doc) => sum + BigInt(doc.amount), 0n);
    assert.strictEqual(recorded, staking.totalStaked());
    assert.ok(staking.totalStaked() + staking.rewardReserve() <= token.balanceOf(staking.address));
}

describe('StakeLedger', () => {
    let ledger: TestLedger;

    beforeEach(async () => {
        ledger = setupLedger();
        await fundParticipant(ledger, ALICE, 1000n);
    });

    describe('stake', () => {
        it('moves exactly the amount from balance into the stake record', async () => {
            const since = ledger.clock.now();
            const result = await ledger.staking.stake(ALICE, 100n);

            assert.strictEqual(result.valid, true);
            assert.strictEqual(ledger.token.balanceOf(ALICE), 900n);
            assert.strictEqual(ledger.token.balanceOf(ledger.staking.address), 100n);
            assert.deepStrictEqual(ledger.staking.getStake(ALICE), { participant: ALICE, amount: 100n, since });
            assert.strictEqual(ledger.staking.totalStaked(), 100n);
            assert.strictEqual(ledger.token.allowance(ALICE, ledger.staking.address), 900n);
            assertCustody(ledger);
        });

        it('emits TokensStaked after the custody transfer', async () => {
            const result = await ledger.staking.stake(ALICE, 100n);

            assert.deepStrictEqual(
                result.events.map(event => event.type),
                ['Transfer', 'Approval', 'TokensStaked']
            );
            const staked = ledger.staking.events('TokensStaked');
            assert.strictEqual(staked.length, 1);
            assert.deepStrictEqual(staked[0].data, { participant: ALICE, amount: '100' });
            const transfers = ledger.token.events('Transfer');
            assert.deepStrictEqual(transfers[transfers.length - 1].data, { from: ALICE, to: ledger.staking.address, value: '100' });
        });

        it('rejects a zero amount with InvalidAmount', async () => {
            const result = await ledger.staking.stake(ALICE, 0n);

            assert.deepStrictEqual({ valid: result.valid, error: result.valid ? undefined : result.error }, { valid: false, error: 'InvalidAmount' });
            assert.strictEqual(ledger.staking.stakedAmount(ALICE), 0n);
        });

        it('rejects negative and non-integer amounts with InvalidAmount', async () => {
            for (const amount of ['-5', '1.5', 'abc']) {
                const result = await ledger.staking.stake(ALICE, amount);
                assert.strictEqual(result.valid ? 'ok' : result.error, 'InvalidAmount');
            }
        });

        it('rejects staking 2000 with 1000 available and changes nothing', async () => {
            await ledger.token.approve(ALICE, ledger.staking.address, 2000n);
            const eventsBefore = ledger.cache.count('events');

            const result = await ledger.staking.stake(ALICE, 2000n);

            assert.strictEqual(result.valid ? 'ok' : result.error, 'InsufficientBalance');
            assert.strictEqual(ledger.token.balanceOf(ALICE), 1000n);
            assert.strictEqual(ledger.staking.stakedAmount(ALICE), 0n);
            assert.strictEqual(ledger.staking.totalStaked(), 0n);
            assert.strictEqual(ledger.cache.count('events'), eventsBefore);
            assert.deepStrictEqual(result.events, []);
        });

        it('rejects an amount above the allowance with InsufficientAllowance', async () => {
            await ledger.token.approve(ALICE, ledger.staking.address, 50n);

            const result = await ledger.staking.stake(ALICE, 100n);

            assert.strictEqual(result.valid ? 'ok' : result.error, 'InsufficientAllowance');
            assert.strictEqual(ledger.token.balanceOf(ALICE), 1000n);
        });

        it('adds to an active stake and resets its start time', async () => {
            await ledger.staking.stake(ALICE, 100n);
            ledger.clock.increase(1000);
            await ledger.staking.stake(ALICE, 50n);

            const stake = ledger.staking.getStake(ALICE);
            assert.strictEqual(stake.amount, 150n);
            assert.strictEqual(stake.since, ledger.clock.now());
            assert.strictEqual(ledger.staking.totalStaked(), 150n);
        });

        it('accepts addresses in mixed case', async () => {
            const result = await ledger.staking.stake(ALICE.toUpperCase().replace('0X', '0x'), 10n);

            assert.strictEqual(result.valid, true);
            assert.strictEqual(ledger.staking.stakedAmount(ALICE), 10n);
        });
    });

    describe('unstake', () => {
        it('returns the principal with zero reward at exactly the minimum period', async () => {
            await ledger.staking.stake(ALICE, 100n);
            ledger.clock.increase(PERIOD);

            const result = await ledger.staking.unstake(ALICE);

            assert.strictEqual(result.valid, true);
            assert.strictEqual(ledger.token.balanceOf(ALICE), 1000n);
            assert.strictEqual(ledger.staking.stakedAmount(ALICE), 0n);
            assert.strictEqual(ledger.staking.totalStaked(), 0n);
            const unstaked = ledger.staking.events('TokensUnstaked');
            assert.strictEqual(unstaked.length, 1);
            assert.deepStrictEqual(unstaked[0].data, { participant: ALICE, principal: '100', reward: '0' });
            assertCustody(ledger);
        });

        it('rejects an unstake before the minimum period with StakingPeriodNotMet', async () => {
            await ledger.staking.stake(ALICE, 100n);
            ledger.clock.increase(PERIOD - 1);

            const result = await ledger.staking.unstake(ALICE);

            assert.strictEqual(result.valid ? 'ok' : result.error, 'StakingPeriodNotMet');
            assert.strictEqual(ledger.staking.stakedAmount(ALICE), 100n);
            assert.strictEqual(ledger.token.balanceOf(ALICE), 900n);
        });

        it('rejects a participant without a stake with Unauthorized', async () => {
            const result = await ledger.staking.unstake(BOB);

            assert.strictEqual(result.valid ? 'ok' : result.error, 'Unauthorized');
        });

        it('rejects a second unstake of the same position', async () => {
            await ledger.staking.stake(ALICE, 100n);
            ledger.clock.increase(PERIOD);
            await ledger.staking.unstake(ALICE);

            const result = await ledger.staking.unstake(ALICE);

            assert.strictEqual(result.valid ? 'ok' : result.error, 'Unauthorized');
            assert.strictEqual(ledger.token.balanceOf(ALICE), 1000n);
        });

        it('pays the accrued reward from the reserve', async () => {
            await ledger.token.approve(OWNER, ledger.staking.address, 10_000n);
            await ledger.staking.fundRewards(OWNER, 10_000n);
            await ledger.staking.stake(ALICE, 1000n);
            ledger.clock.increase(2 * PERIOD);

            const result = await ledger.staking.unstake(ALICE);

            assert.strictEqual(result.valid, true);
            assert.strictEqual(ledger.token.balanceOf(ALICE), 1100n);
            assert.strictEqual(ledger.staking.rewardReserve(), 9900n);
            assert.strictEqual(ledger.token.balanceOf(ledger.staking.address), 9900n);
            const unstaked: EventOfType<'TokensUnstaked'>[] = ledger.staking.events('TokensUnstaked');
            assert.deepStrictEqual(unstaked[0].data, { participant: ALICE, principal: '1000', reward: '100' });
            const transfers = ledger.token.events('Transfer');
            assert.deepStrictEqual(transfers[transfers.length - 1].data, { from: ledger.staking.address, to: ALICE, value: '1100' });
            assertCustody(ledger);
        });

        it('rejects a reward the reserve cannot cover with InsufficientRewardReserve', async () => {
            await ledger.staking.stake(ALICE, 1000n);
            ledger.clock.increase(2 * PERIOD);

            const result = await ledger.staking.unstake(ALICE);

            assert.strictEqual(result.valid ? 'ok' : result.error, 'InsufficientRewardReserve');
            assert.strictEqual(ledger.staking.stakedAmount(ALICE), 1000n);
        });

        it('rolls back every write when the payout fails mid-processing', async () => {
            // A record without matching custody: the payout transfer is the step that fails
            ledger.cache.upsertOne('stakes', {
                _id: stakeRecordId(ledger.staking.address, BOB),
                contract: ledger.staking.address,
                participant: BOB,
                amount: toDbString(500n),
                since: ledger.clock.now(),
            });
            ledger.cache.commit();
            ledger.clock.increase(PERIOD);
            const eventsBefore = ledger.cache.count('events');
            const batchesBefore = ledger.writer.batches.length;

            const result = await ledger.staking.unstake(BOB);

            assert.strictEqual(result.valid ? 'ok' : result.error, 'InsufficientRewardReserve');
            assert.strictEqual(ledger.staking.stakedAmount(BOB), 500n);
            assert.strictEqual(ledger.staking.totalStaked(), 0n);
            assert.strictEqual(ledger.token.balanceOf(BOB), 0n);
            assert.strictEqual(ledger.cache.count('events'), eventsBefore);
            assert.strictEqual(ledger.cache.isDirty(), false);
            await ledger.cache.flush();
            assert.strictEqual(ledger.writer.batches.length, batchesBefore);
        });
    });

    describe('calculateReward', () => {
        it('is zero for a participant who never staked', () => {
            assert.strictEqual(ledger.staking.calculateReward(BOB), 0n);
        });

        it('is zero up to and including the minimum period', async () => {
            await ledger.staking.stake(ALICE, 1000n);
            ledger.clock.increase(PERIOD - 1);
            assert.strictEqual(ledger.staking.calculateReward(ALICE), 0n);
            ledger.clock.increase(1);
            assert.strictEqual(ledger.staking.calculateReward(ALICE), 0n);
        });

        it('grows linearly after the minimum period', async () => {
            await ledger.staking.stake(ALICE, 1000n);
            ledger.clock.increase(PERIOD + PERIOD / 2);
            assert.strictEqual(ledger.staking.calculateReward(ALICE), 50n);
            ledger.clock.increase(PERIOD / 2);
            assert.strictEqual(ledger.staking.calculateReward(ALICE), 100n);
            ledger.clock.increase(PERIOD);
            assert.strictEqual(ledger.staking.calculateReward(ALICE), 200n);
        });

        it('returns the same value when called repeatedly without time passing', async () => {
            await ledger.staking.stake(ALICE, 1000n);
            ledger.clock.increase(3 * PERIOD);
            const first = ledger.staking.calculateReward(ALICE);
            const second = ledger.staking.calculateReward(ALICE);

            assert.strictEqual(first, 200n);
            assert.strictEqual(second, first);
            assert.strictEqual(ledger.cache.isDirty(), false);
        });
    });

    describe('administration', () => {
        it('lets the owner fund and withdraw the reward reserve', async () => {
            await ledger.token.approve(OWNER, ledger.staking.address, 5000n);

            const funded = await ledger.staking.fundRewards(OWNER, 5000n);
            assert.strictEqual(funded.valid, true);
            assert.strictEqual(ledger.staking.rewardReserve(), 5000n);
            assert.deepStrictEqual(ledger.staking.events('RewardsFunded')[0].data, { funder: OWNER, amount: '5000' });

            const withdrawn = await ledger.staking.withdrawRewards(OWNER, 2000n);
            assert.strictEqual(withdrawn.valid, true);
            assert.strictEqual(ledger.staking.rewardReserve(), 3000n);
            assert.strictEqual(ledger.token.balanceOf(ledger.staking.address), 3000n);
            assert.deepStrictEqual(ledger.staking.events('RewardsWithdrawn')[0].data, { owner: OWNER, amount: '2000' });
        });

        it('never lets the owner withdraw staked principal', async () => {
            await ledger.staking.stake(ALICE, 500n);

            const result = await ledger.staking.withdrawRewards(OWNER, 1n);

            assert.strictEqual(result.valid ? 'ok' : result.error, 'InsufficientRewardReserve');
            assert.strictEqual(ledger.token.balanceOf(ledger.staking.address), 500n);
        });

        it('rejects owner-gated operations from anyone else with Unauthorized', async () => {
            const results = [
                await ledger.staking.fundRewards(ALICE, 10n),
                await ledger.staking.withdrawRewards(ALICE, 10n),
                await ledger.staking.transferOwnership(ALICE, ALICE),
            ];

            assert.deepStrictEqual(
                results.map(result => (result.valid ? 'ok' : result.error)),
                ['Unauthorized', 'Unauthorized', 'Unauthorized']
            );
        });

        it('transfers ownership and gates on the new owner', async () => {
            const result = await ledger.staking.transferOwnership(OWNER, CAROL);

            assert.strictEqual(result.valid, true);
            assert.strictEqual(ledger.staking.owner(), CAROL);
            const transferred = ledger.staking.events('OwnershipTransferred');
            assert.deepStrictEqual(transferred[transferred.length - 1].data, { previousOwner: OWNER, newOwner: CAROL });

            const stale = await ledger.staking.withdrawRewards(OWNER, 1n);
            assert.strictEqual(stale.valid ? 'ok' : stale.error, 'Unauthorized');
        });

        it('rejects an invalid new owner with InvalidAddress', async () => {
            const result = await ledger.staking.transferOwnership(OWNER, '0x1234');

            assert.strictEqual(result.valid ? 'ok' : result.error, 'InvalidAddress');
            assert.strictEqual(ledger.staking.owner(), OWNER);
        });
    });

    describe('execution', () => {
        it('serializes concurrent submissions in order', async () => {
            const [first, second] = await Promise.all([ledger.staking.stake(ALICE, 600n), ledger.staking.stake(ALICE, 600n)]);

            assert.strictEqual(first.valid, true);
            assert.strictEqual(second.valid ? 'ok' : second.error, 'InsufficientBalance');
            assert.strictEqual(ledger.staking.stakedAmount(ALICE), 600n);
            assertCustody(ledger);
        });

        it('notifies subscribers only of committed events', async () => {
            const seen: string[] = [];
            const unsubscribe = ledger.staking.on('TokensStaked', event => seen.push(`${event.data.participant}:${event.data.amount}`));

            await ledger.staking.stake(ALICE, 0n);
            await ledger.staking.stake(ALICE, 40n);
            unsubscribe();
            await ledger.staking.stake(ALICE, 60n);

            assert.deepStrictEqual(seen, [`${ALICE}:40`]);
        });

        it('hands each committed stake to the writer', async () => {
            await ledger.staking.stake(ALICE, 100n);
            await ledger.cache.flush();

            const last = ledger.writer.batches[ledger.writer.batches.length - 1];
            assert.deepStrictEqual(
                last.stakes.map(doc => [doc.participant, doc.amount]),
                [[ALICE, toDbString(100n)]]
            );
            assert.deepStrictEqual(
                last.events.map(event => event.type),
                ['Transfer', 'Approval', 'TokensStaked']
            );
        });
    });
});
