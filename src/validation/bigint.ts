import config from '../config.js';
import { toBigInt } from '../utils/bigint.js';

const maxValue: bigint = toBigInt(config.maxValue);

/**
 * Validates a BigInt value against specified constraints
 * @param value - The value to validate (string or bigint)
 * @param allowZero - Whether to allow zero value
 * @param allowNegative - Whether to allow negative values
 * @param minValue - Optional minimum value
 * @returns boolean indicating if value meets all constraints
 */
export default function validateBigInt(
    value: unknown,
    allowZero = false,
    allowNegative = false,
    minValue?: bigint
): value is string | bigint {
    if (typeof value !== 'string' && typeof value !== 'bigint') return false;

    let numValue: bigint;
    try {
        numValue = toBigInt(value);
    } catch {
        return false;
    }

    if (!allowZero && numValue === 0n) return false;
    if (!allowNegative && numValue < 0n) return false;
    if (numValue > maxValue) return false;
    if (minValue !== undefined && numValue < minValue) return false;

    return true;
}
