// Maximum expected length for any amount we store.
// Mint prices and treasury balances stay well below 30 digits.
const MAX_INTEGER_LENGTH = 32;

/**
 * Convert a value to BigInt, handling null, undefined, and string inputs
 */
export function toBigInt(value: string | bigint | number | null | undefined): bigint {
    if (value === null || value === undefined) return BigInt(0);
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return BigInt(Math.floor(value));
    // Remove padding before converting to BigInt
    return BigInt(value.replace(/^0+/, '') || '0');
}

/**
 * Convert a value to BigInt and then to a zero-padded string suitable for database storage
 * Ensures correct lexicographical sorting in MongoDB
 * @param value The value to convert (number, string, or bigint)
 * @param padLength Optional custom pad length
 * @returns A zero-padded string representation
 */
export function toDbString(
    value: number | string | bigint,
    padLength = MAX_INTEGER_LENGTH
): string {
    const bigValue = toBigInt(value);
    const isNegative = bigValue < 0n;
    const absStr = (isNegative ? -bigValue : bigValue).toString();

    if (absStr.length > padLength) {
        throw new Error(`Value ${value} too large to fit in padLength=${padLength}`);
    }

    const padded = absStr.padStart(padLength, '0');
    return isNegative ? '-' + padded : padded;
}

/** Parses an amount that may arrive as a number, decimal string or bigint; undefined when malformed. */
export function parseAmount(value: unknown): bigint | undefined {
    if (typeof value === 'bigint') return value;
    if (typeof value === 'number') return Number.isSafeInteger(value) ? BigInt(value) : undefined;
    if (typeof value === 'string' && /^-?\d+$/.test(value)) return toBigInt(value);
    return undefined;
}
