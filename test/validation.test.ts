import assert from 'assert';
import { describe, it } from 'node:test';

import { StateCache } from '../src/cache.js';
import config from '../src/config.js';
import { adjustUserBalance } from '../src/utils/account.js';
import validate from '../src/validation/index.js';

const ADDRESS = '0x' + 'ab'.repeat(20);

describe('validate.address', () => {
    it('accepts 0x-prefixed 40-digit hex in any case', () => {
        assert.strictEqual(validate.address(ADDRESS), true);
        assert.strictEqual(validate.address(ADDRESS.toUpperCase().replace('0X', '0x')), true);
    });

    it('rejects wrong length, prefix or characters', () => {
        assert.strictEqual(validate.address('0x1234'), false);
        assert.strictEqual(validate.address('ab'.repeat(21)), false);
        assert.strictEqual(validate.address('0x' + 'g'.repeat(40)), false);
        assert.strictEqual(validate.address(42), false);
    });

    it('rejects the zero address unless allowed', () => {
        assert.strictEqual(validate.address(config.zeroAddress), false);
        assert.strictEqual(validate.address(config.zeroAddress, true), true);
    });
});

describe('validate.bigint', () => {
    it('applies zero, sign and range constraints', () => {
        assert.strictEqual(validate.bigint('10'), true);
        assert.strictEqual(validate.bigint(0n), false);
        assert.strictEqual(validate.bigint(0n, true), true);
        assert.strictEqual(validate.bigint(-1n, true), false);
        assert.strictEqual(validate.bigint(-1n, true, true), true);
        assert.strictEqual(validate.bigint(5n, false, false, 6n), false);
        assert.strictEqual(validate.bigint(BigInt(config.maxValue) + 1n), false);
    });

    it('rejects non-integer input', () => {
        assert.strictEqual(validate.bigint('1.5'), false);
        assert.strictEqual(validate.bigint(10), false);
        assert.strictEqual(validate.bigint(undefined), false);
    });
});

describe('validate.string and token fields', () => {
    it('checks length and edge characters', () => {
        assert.strictEqual(validate.string('abc', 3, 1), true);
        assert.strictEqual(validate.string('abcd', 3, 1), false);
        assert.strictEqual(validate.string('a-b', 5, 1, 'ab', 'ab-'), true);
        assert.strictEqual(validate.string('-ab', 5, 1, 'ab', 'ab-'), false);
    });

    it('validates token symbol, name and decimals', () => {
        assert.strictEqual(validate.tokenSymbol('STK'), true);
        assert.strictEqual(validate.tokenSymbol('stk'), false);
        assert.strictEqual(validate.tokenSymbol('S'), false);
        assert.strictEqual(validate.tokenName(''), false);
        assert.strictEqual(validate.tokenDecimals(18), true);
        assert.strictEqual(validate.tokenDecimals(19), false);
        assert.strictEqual(validate.tokenDecimals(1.5), false);
    });
});

describe('validate.userBalances', () => {
    it('requires every listed balance', () => {
        const cache = new StateCache();
        adjustUserBalance(cache, ADDRESS, 'STK', 100n, 1);
        adjustUserBalance(cache, ADDRESS, 'OTHER', 5n, 1);

        assert.strictEqual(validate.userBalances(cache, ADDRESS, [{ symbol: 'STK', amount: '100' }]), true);
        assert.strictEqual(
            validate.userBalances(cache, ADDRESS, [
                { symbol: 'STK', amount: 50n },
                { symbol: 'OTHER', amount: 6n },
            ]),
            false
        );
    });
});
