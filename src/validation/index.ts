import address from './address.js';
import bigint from './bigint.js';
import string from './string.js';
import userBalances from './balance.js';
import { tokenSymbol, tokenName, tokenDecimals } from './token.js';

/**
 * Validation module with functions for validating different data types
 */
const validation = {
    address,
    bigint,
    string,
    userBalances,
    tokenSymbol,
    tokenName,
    tokenDecimals,
};

export type ValidationModule = typeof validation;

export default validation;
