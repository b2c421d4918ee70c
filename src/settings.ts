import config from './config.js';

// Runtime settings sourced from environment variables

function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export const mongoUrl: string = process.env.MONGO_URL || 'mongodb://localhost:27017';
export const mongoDb: string = process.env.MONGO_DB || 'stake-ledger';
export const ownerAddress: string = process.env.OWNER_ADDRESS || '';
export const minStakingPeriod: number = intFromEnv('MIN_STAKING_PERIOD', config.minStakingPeriod);
export const rewardRatePercent: number = intFromEnv('REWARD_RATE_PERCENT', config.rewardRatePercent);
// Latest events held in memory after a restart; 0 keeps the full history
export const warmupEvents: number = intFromEnv('WARMUP_EVENTS', 0);

/**
 * True when a `process.versions.node` string meets the minimum major version.
 */
export function isSupportedNodeVersion(version: string, minimum = config.minNodeVersion): boolean {
    const major = parseInt(version.split('.')[0], 10);
    return !Number.isNaN(major) && major >= minimum;
}

export default {
    mongoUrl,
    mongoDb,
    ownerAddress,
    minStakingPeriod,
    rewardRatePercent,
    warmupEvents,
};
