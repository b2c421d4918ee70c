import assert from 'assert';
import { describe, it } from 'node:test';

import config from '../src/config.js';
import { isSupportedNodeVersion } from '../src/settings.js';

describe('isSupportedNodeVersion', () => {
    it('accepts the minimum major and anything newer', () => {
        assert.strictEqual(config.minNodeVersion, 20);
        assert.strictEqual(isSupportedNodeVersion('20.0.0'), true);
        assert.strictEqual(isSupportedNodeVersion('22.11.0'), true);
        assert.strictEqual(isSupportedNodeVersion('24.1.0'), true);
    });

    it('rejects older or unreadable versions', () => {
        assert.strictEqual(isSupportedNodeVersion('18.19.1'), false);
        assert.strictEqual(isSupportedNodeVersion('v20.0.0'), false);
        assert.strictEqual(isSupportedNodeVersion(''), false);
    });
});
