import config from '../config.js';
import validateString from './string.js';

export const tokenSymbol = (value: unknown): value is string =>
    validateString(value, config.tokenSymbolMaxLength, config.tokenSymbolMinLength, config.tokenSymbolAllowedChars, config.tokenSymbolAllowedChars);

export const tokenName = (value: unknown): value is string =>
    validateString(value, config.tokenNameMaxLength, 1);

export const tokenDecimals = (value: unknown): value is number =>
    typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= config.tokenDecimalsMax;

export default { tokenSymbol, tokenName, tokenDecimals };
