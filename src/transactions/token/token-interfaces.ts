// Token interfaces with string | bigint for all amount fields at the edges;
// stored documents keep amounts as padded strings (see toDbString)

export type TokenData = {
    _id: string; // symbol
    symbol: string;
    name: string;
    decimals: number;
    totalSupply: string;
    owner: string;
    createdAt: number;
};

export type AccountData = {
    _id: string; // address
    balances: Record<string, string>; // symbol -> padded amount
    allowances: Record<string, Record<string, string>>; // symbol -> spender -> padded amount
    createdAt: number;
    lastUpdatedAt: number;
};

export interface TokenTransferData {
    symbol: string;
    to: string;
    amount: string | bigint;
}

export interface TokenApproveData {
    symbol: string;
    spender: string;
    amount: string | bigint;
}

export interface TokenTransferFromData {
    symbol: string;
    from: string;
    to: string;
    amount: string | bigint;
}

export interface TokenMintData {
    symbol: string;
    to: string;
    amount: string | bigint;
}

export interface TokenBurnData {
    symbol: string;
    amount: string | bigint;
}

export interface TokenDeployParams {
    symbol: string;
    name: string;
    decimals: number;
    initialSupply: string | bigint; // smallest unit
    owner: string;
}
