import type { StateCache } from './cache.js';
import config from './config.js';
import logger from './logger.js';
import { StakingContractData, StakingDeployParams } from './transactions/staking/staking-interfaces.js';
import { TokenData, TokenDeployParams } from './transactions/token/token-interfaces.js';
import type { TransactionContext } from './transactions/types.js';
import { setTokenDecimals, toBigInt, toDbString } from './utils/bigint.js';
import { deterministicAddressFrom, deterministicIdFrom } from './utils/deterministic-id.js';
import { logEvent } from './utils/event-logger.js';
import { getStakingContract } from './utils/staking.js';
import { adjustSupply, getToken } from './utils/token.js';
import validate from './validation/index.js';

function genesisContext(cache: StateCache, timestamp: number, parts: string[]): TransactionContext {
    return { cache, timestamp, index: 0, transactionId: deterministicIdFrom(['genesis', ...parts, timestamp], 64) };
}

/**
 * Apply a deployment's writes as one committed unit; any throw rolls them back and is rethrown.
 */
function commitDeployment(cache: StateCache, apply: () => void): void {
    if (cache.isDirty()) {
        throw new Error('Cannot deploy while another operation has uncommitted writes');
    }
    try {
        apply();
        cache.commit();
    } catch (error) {
        cache.rollback();
        throw error;
    }
}

/**
 * Create the token and mint its initial supply (smallest unit) to the owner.
 */
export function deployToken(cache: StateCache, timestamp: number, params: TokenDeployParams): TokenData {
    if (!validate.tokenSymbol(params.symbol)) throw new Error(`Invalid token symbol: ${params.symbol}`);
    if (!validate.tokenName(params.name)) throw new Error(`Invalid token name: ${params.name}`);
    if (!validate.tokenDecimals(params.decimals)) throw new Error(`Invalid token decimals: ${params.decimals}`);
    if (!validate.address(params.owner)) throw new Error(`Invalid token owner: ${params.owner}`);
    if (!validate.bigint(params.initialSupply, true, false)) throw new Error(`Invalid initial supply: ${params.initialSupply}`);
    if (getToken(cache, params.symbol)) throw new Error(`Token ${params.symbol} already exists`);

    const owner = params.owner.toLowerCase();
    const supply = toBigInt(params.initialSupply);
    const token: TokenData = {
        _id: params.symbol,
        symbol: params.symbol,
        name: params.name,
        decimals: params.decimals,
        totalSupply: toDbString(0n),
        owner,
        createdAt: timestamp,
    };

    commitDeployment(cache, () => {
        cache.insertOne('tokens', token);
        if (supply > 0n && !adjustSupply(genesisContext(cache, timestamp, ['token', token.symbol]), token, owner, supply)) {
            throw new Error(`Failed to mint initial supply of ${token.symbol}`);
        }
    });
    setTokenDecimals(token.symbol, token.decimals);

    logger.info(`[genesis] Deployed token ${token.symbol} (${token.name}) with supply ${supply} owned by ${owner}.`);
    return { ...token, totalSupply: toDbString(supply) };
}

/**
 * Create a staking contract over an existing token. The contract address doubles as its custody account.
 */
export function deployStaking(cache: StateCache, timestamp: number, params: StakingDeployParams): StakingContractData {
    const rewardRatePercent = params.rewardRatePercent ?? config.rewardRatePercent;
    if (!Number.isInteger(params.minStakingPeriod) || params.minStakingPeriod <= 0) {
        throw new Error(`minStakingPeriod must be a positive integer, got ${params.minStakingPeriod}`);
    }
    if (!Number.isInteger(rewardRatePercent) || rewardRatePercent < 0) {
        throw new Error(`rewardRatePercent must be a non-negative integer, got ${rewardRatePercent}`);
    }
    if (!validate.address(params.owner)) throw new Error(`Invalid staking owner: ${params.owner}`);
    if (!getToken(cache, params.tokenSymbol)) throw new Error(`Token ${params.tokenSymbol} does not exist`);

    const owner = params.owner.toLowerCase();
    const address = deterministicAddressFrom(['staking', params.tokenSymbol, owner, params.minStakingPeriod, rewardRatePercent, timestamp]);
    if (getStakingContract(cache, address)) throw new Error(`Staking contract ${address} already exists`);

    const contract: StakingContractData = {
        _id: address,
        tokenSymbol: params.tokenSymbol,
        owner,
        minStakingPeriod: params.minStakingPeriod,
        rewardRatePercent,
        totalStaked: toDbString(0n),
        rewardReserve: toDbString(0n),
        createdAt: timestamp,
    };

    commitDeployment(cache, () => {
        cache.insertOne('contracts', contract);
        logEvent(genesisContext(cache, timestamp, ['staking', address]), 'staking', address, owner, {
            type: 'OwnershipTransferred',
            data: { previousOwner: config.zeroAddress, newOwner: owner },
        });
    });

    logger.info(
        `[genesis] Deployed staking contract ${address} for ${params.tokenSymbol}: period ${params.minStakingPeriod}s, rate ${rewardRatePercent}%.`
    );
    return contract;
}
