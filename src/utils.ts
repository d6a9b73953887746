/**
 * Some help functions
 */

/**
 * Get hex string of a number, zero padded to `digits` and upper cased
 * @param input Input number
 * @param digits Minimum hex digit count
 * @returns Hex string
 */
export function hexify(input: bigint | number, digits: number = 8): string {
    return `0x${input.toString(16).toUpperCase().padStart(digits, "0")}`;
}

/**
 * Check whether a value is a single bit
 * @param value candidate element
 * @returns true if value is 0 or 1
 */
export function isBit(value: unknown): value is Bit {
    return value === 0 || value === 1;
}

/**
 * Read a bit from an LSB-first vector, treating positions past either end as 0
 * @param bits bit vector
 * @param index bit position
 */
export function bitAt(bits: BitVector, index: number): Bit {
    if (index < 0 || index >= bits.length)
        return 0;
    return bits[index];
}

/**
 * Freeze a freshly built vector so it can be handed out as an immutable value
 * @param bits working register
 */
export function seal(bits: Bit[]): BitVector {
    return Object.freeze(bits);
}

// One-bit gates
export function andBit(a: Bit, b: Bit): Bit {
    return a === 1 && b === 1 ? 1 : 0;
}

export function orBit(a: Bit, b: Bit): Bit {
    return a === 1 || b === 1 ? 1 : 0;
}

export function xorBit(a: Bit, b: Bit): Bit {
    return a !== b ? 1 : 0;
}

/**
 * Types
 */
export type Pair<T1, T2> = [T1, T2];
export type Bit = 0 | 1;
// LSB first, index 0 is the least significant bit
export type BitVector = readonly Bit[];
// Exactly 32 elements, only produced by validation or by an operation
export type BitVector32 = BitVector;
export type BitInput = readonly number[];
