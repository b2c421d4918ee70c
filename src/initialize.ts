import { StateCache, StateWriter } from './cache.js';
import { Clock, systemClock } from './clock.js';
import config from './config.js';
import { deployStaking, deployToken } from './genesis.js';
import logger from './logger.js';
import { StakeLedger } from './stakeLedger.js';
import { TokenLedger } from './tokenLedger.js';
import { TransactionExecutor } from './transaction.js';
import { StakingDeployParams } from './transactions/staking/staking-interfaces.js';
import { TokenDeployParams } from './transactions/token/token-interfaces.js';
import { setTokenDecimals, toBigInt } from './utils/bigint.js';
import { getToken } from './utils/token.js';

export interface InitializeOptions {
    owner: string;
    cache?: StateCache;
    clock?: Clock;
    writer?: StateWriter;
    token?: Partial<Omit<TokenDeployParams, 'owner'>>;
    staking?: Partial<Pick<StakingDeployParams, 'minStakingPeriod' | 'rewardRatePercent'>>;
}

export interface LedgerDeployment {
    cache: StateCache;
    clock: Clock;
    executor: TransactionExecutor;
    token: TokenLedger;
    staking: StakeLedger;
}

/**
 * Bind ledgers to a state cache, deploying the token and staking contract if the cache holds none.
 * A cache warmed from storage keeps its existing deployments.
 */
export function initialize(options: InitializeOptions): LedgerDeployment {
    const cache = options.cache ?? new StateCache();
    const clock = options.clock ?? systemClock;
    if (options.writer) cache.setWriter(options.writer);

    const symbol = options.token?.symbol ?? config.tokenSymbol;
    let token = getToken(cache, symbol);
    if (token) {
        setTokenDecimals(token.symbol, token.decimals);
        logger.info(`[initialize] Using existing token ${token.symbol}.`);
    } else {
        const decimals = options.token?.decimals ?? config.tokenDecimals;
        token = deployToken(cache, clock.now(), {
            symbol,
            name: options.token?.name ?? config.tokenName,
            decimals,
            initialSupply: options.token?.initialSupply ?? toBigInt(config.initialSupply) * 10n ** BigInt(decimals),
            owner: options.owner,
        });
    }

    let contract = cache.find('contracts', doc => doc.tokenSymbol === symbol)[0];
    if (contract) {
        logger.info(`[initialize] Using existing staking contract ${contract._id}.`);
    } else {
        contract = deployStaking(cache, clock.now(), {
            tokenSymbol: symbol,
            owner: options.owner,
            minStakingPeriod: options.staking?.minStakingPeriod ?? config.minStakingPeriod,
            rewardRatePercent: options.staking?.rewardRatePercent ?? config.rewardRatePercent,
        });
    }

    const executor = new TransactionExecutor(cache, clock);
    return {
        cache,
        clock,
        executor,
        token: new TokenLedger(executor, token.symbol),
        staking: new StakeLedger(executor, contract._id),
    };
}

export default initialize;
