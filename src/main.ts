import 'dotenv/config';

import { StateCache } from './cache.js';
import { systemClock } from './clock.js';
import config from './config.js';
import { initialize } from './initialize.js';
import logger from './logger.js';
import { addMongoIndexes, connect, loadState, MongoStateWriter } from './mongo.js';
import settings, { isSupportedNodeVersion } from './settings.js';
import { formatTokenAmount } from './utils/bigint.js';
import validate from './validation/index.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal('CRITICAL: Unhandled Rejection:', { reason_details: String(reason) });
    if (reason instanceof Error && reason.stack) {
        logger.fatal('Stack Trace:', reason.stack);
    }
});

process.on('uncaughtException', (error: Error) => {
    logger.fatal('CRITICAL: Uncaught Exception:', { errorName: error.name, errorMessage: error.message, stack: error.stack });
});

if (!isSupportedNodeVersion(process.versions.node)) {
    logger.fatal(`Wrong NodeJS version v${process.versions.node}. Requires v${config.minNodeVersion} or newer.`);
    process.exit(1);
} else {
    logger.info('Correctly using NodeJS v' + process.versions.node);
}

export async function main(): Promise<void> {
    logger.info('Starting stake ledger...');

    if (!validate.address(settings.ownerAddress)) {
        logger.fatal(`OWNER_ADDRESS must be a 0x-prefixed 20-byte hex address, got '${settings.ownerAddress}'.`);
        process.exitCode = 1;
        return;
    }

    const { client, db } = await connect();
    try {
        await addMongoIndexes(db);

        const cache = new StateCache();
        await loadState(db, cache);

        const { token, staking } = initialize({
            cache,
            clock: systemClock,
            owner: settings.ownerAddress,
            writer: new MongoStateWriter(db),
            staking: {
                minStakingPeriod: settings.minStakingPeriod,
                rewardRatePercent: settings.rewardRatePercent,
            },
        });

        const { minStakingPeriod, rewardRatePercent } = staking.terms();
        logger.info(`Token ${token.symbol} (${token.name}): supply ${formatTokenAmount(token.totalSupply(), token.symbol)}, owner ${token.owner}`);
        logger.info(`Staking contract ${staking.address}: period ${minStakingPeriod}s, rate ${rewardRatePercent}%, owner ${staking.owner()}`);
        logger.info(
            `Staked ${formatTokenAmount(staking.totalStaked(), token.symbol)}, reward reserve ${formatTokenAmount(staking.rewardReserve(), token.symbol)}`
        );

        await cache.flush();
    } finally {
        await client.close();
        logger.info('MongoDB connection closed.');
    }
}

main().catch((error: unknown) => {
    logger.fatal(`Stake ledger failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
