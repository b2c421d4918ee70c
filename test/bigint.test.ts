import assert from 'assert';
import { describe, it } from 'node:test';

import { bigintReplacer, formatTokenAmount, parseTokenAmount, setTokenDecimals, toBigInt, toDbString } from '../src/utils/bigint.js';

setTokenDecimals('TOKEN6', 6);
setTokenDecimals('TOKEN0', 0);

describe('toBigInt', () => {
    it('treats missing values as zero', () => {
        assert.strictEqual(toBigInt(null), 0n);
        assert.strictEqual(toBigInt(undefined), 0n);
    });

    it('reads padded and signed strings', () => {
        assert.strictEqual(toBigInt('000000123'), 123n);
        assert.strictEqual(toBigInt('-000042'), -42n);
        assert.strictEqual(toBigInt('0000'), 0n);
    });

    it('throws on non-integer strings', () => {
        assert.throws(() => toBigInt('1.5'), SyntaxError);
        assert.throws(() => toBigInt('12abc'), SyntaxError);
    });
});

describe('toDbString', () => {
    it('pads to a fixed width that sorts numerically', () => {
        const small = toDbString(9n);
        const large = toDbString(10n);

        assert.strictEqual(small.length, 48);
        assert.strictEqual(small, '9'.padStart(48, '0'));
        assert.ok(small < large);
    });

    it('keeps the sign in front of the padding', () => {
        assert.strictEqual(toDbString(-5n, 4), '-0005');
    });

    it('refuses values wider than the pad', () => {
        assert.throws(() => toDbString(12345n, 4));
    });
});

describe('token amounts', () => {
    it('formats with the registered decimals', () => {
        assert.strictEqual(formatTokenAmount(1_500_000n, 'TOKEN6'), '1.5');
        assert.strictEqual(formatTokenAmount(1n, 'TOKEN6'), '0.000001');
        assert.strictEqual(formatTokenAmount(25n, 'TOKEN0'), '25');
    });

    it('parses decimal strings into the smallest unit', () => {
        assert.strictEqual(parseTokenAmount('1.5', 'TOKEN6'), 1_500_000n);
        assert.strictEqual(parseTokenAmount('2', 'TOKEN6'), 2_000_000n);
        assert.strictEqual(parseTokenAmount('0.1234567', 'TOKEN6'), 123_456n);
    });

    it('serializes bigints in JSON', () => {
        assert.strictEqual(JSON.stringify({ amount: 10n }, bigintReplacer), '{"amount":"10"}');
    });
});
