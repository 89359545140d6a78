import config from '../config.js';
import { parseAmount, toBigInt } from '../utils/bigint.js';

const maxValue: bigint = toBigInt(config.maxValue);
/**
 * Validates an amount against specified constraints
 * @param value - The value to validate (number, decimal string or bigint)
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
): boolean {
    const numValue = parseAmount(value);
    if (numValue === undefined) return false;

    if (!allowZero && numValue === 0n) return false;
    if (!allowNegative && numValue < 0n) return false;
    if (numValue > maxValue) return false;
    if (minValue !== undefined && numValue < minValue) return false;

    return true;
}
