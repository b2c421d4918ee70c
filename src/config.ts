const config = {
    tokenName: 'Stake Token',
    tokenSymbol: 'STK',
    tokenDecimals: 18,
    // Whole units, scaled by tokenDecimals at deployment
    initialSupply: '1000000',
    minStakingPeriod: 60 * 60 * 24 * 7, // 7 days, in seconds
    rewardRatePercent: 10,
    maxValue: '999999999999999999999999999999999999999999',
    zeroAddress: '0x0000000000000000000000000000000000000000',
    addressAllowedChars: '0123456789abcdefABCDEF',
    addressHexLength: 40,
    tokenSymbolAllowedChars: 'ABCDEFGHIJKLMNOPQRSTUVWXYZ1234567890',
    tokenSymbolMinLength: 2,
    tokenSymbolMaxLength: 10,
    tokenNameMaxLength: 50,
    tokenDecimalsMax: 18,
    eventIdLength: 24,
    minNodeVersion: 20, // keep in step with package.json engines
};

export type LedgerConfig = typeof config;

export default config;
