import config from '../config.js';
import validateString from './string.js';

/**
 * Validates a 0x-prefixed, 20-byte hex address.
 * @param allowZero whether the zero address is acceptable
 */
export default function validateAddress(value: unknown, allowZero = false): value is string {
    if (!validateString(value, config.addressHexLength + 2, config.addressHexLength + 2)) return false;
    if (!value.startsWith('0x')) return false;
    if (!validateString(value.slice(2), config.addressHexLength, config.addressHexLength, config.addressAllowedChars, config.addressAllowedChars)) return false;
    if (!allowZero && value.toLowerCase() === config.zeroAddress) return false;
    return true;
}
