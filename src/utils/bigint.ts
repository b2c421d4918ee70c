// Maximum expected length for any stored integer.
// Covers config.maxValue (42 digits) with headroom; a fixed width keeps lexicographic order in MongoDB
const MAX_INTEGER_LENGTH = 48;

// Mapping of token symbols to their decimal places
const TOKEN_DECIMALS: { [symbol: string]: number } = {};

/**
 * Set decimal places for a token
 * @param symbol Token symbol
 * @param decimals Number of decimal places
 */
export function setTokenDecimals(symbol: string, decimals: number): void {
    TOKEN_DECIMALS[symbol] = decimals;
}

/**
 * Get decimal places for a token, defaulting to 18 when the token was never registered
 */
export function getTokenDecimals(symbol: string): number {
    return TOKEN_DECIMALS[symbol] ?? 18;
}

/**
 * Convert a value to BigInt, handling null, undefined, padded and signed string inputs.
 * Throws on strings that are not integers.
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return BigInt(0);
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value));
    const negative = value.startsWith('-');
    const digits = (negative ? value.slice(1) : value).replace(/^0+/, '') || '0';
    if (!/^\d+$/.test(digits)) {
        throw new SyntaxError(`Cannot convert ${value} to a BigInt`);
    }
    const parsed = BigInt(digits);
    return negative ? -parsed : parsed;
}

/**
 * Convert a value to a zero-padded string suitable for database storage
 * @param value The value to convert
 * @param padLength Optional custom pad length
 */
export function toDbString(value: number | string | bigint, padLength = MAX_INTEGER_LENGTH): string {
    const bigValue = toBigInt(value);
    const isNegative = bigValue < 0n;
    const absStr = (isNegative ? -bigValue : bigValue).toString();

    if (absStr.length > padLength) {
        throw new Error(`Value ${value} too large to fit in padLength=${padLength}`);
    }

    const padded = absStr.padStart(padLength, '0');
    return isNegative ? '-' + padded : padded;
}

/**
 * Format a token amount with the token's decimal places, trimming trailing zeros
 */
export function formatTokenAmount(value: bigint, symbol: string): string {
    const decimals = getTokenDecimals(symbol);
    if (decimals === 0) return value.toString();
    const negative = value < 0n;
    const str = (negative ? -value : value).toString().padStart(decimals + 1, '0');
    const integerPart = str.slice(0, -decimals) || '0';
    const decimalPart = str.slice(-decimals);

    const trimmedDecimal = decimalPart.replace(/0+$/, '');
    const formatted = trimmedDecimal ? `${integerPart}.${trimmedDecimal}` : integerPart;
    return negative ? `-${formatted}` : formatted;
}

/**
 * Parse a decimal token amount string into the token's smallest unit.
 * Extra fractional digits beyond the token's precision are truncated.
 */
export function parseTokenAmount(value: string, symbol: string): bigint {
    const decimals = getTokenDecimals(symbol);
    const [integerPart = '0', decimalPart = ''] = value.split('.');
    const paddedDecimal = decimalPart.padEnd(decimals, '0').slice(0, decimals);
    return toBigInt(integerPart + paddedDecimal);
}

/**
 * JSON.stringify replacer that serializes bigint values as decimal strings
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}
