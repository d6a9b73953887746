/**
 * Two's-complement tools for 32-bit values.
 *
 * Overflow here is about the mathematical value not fitting the signed
 * range; the produced pattern is always the modulo 2^32 wraparound.
 */

import { range } from "lodash";
import { assertBitVector, fieldValue, fromUnsigned, toGroupedBinary, toHex, U32_MAX } from "./bits";
import { RVFormatError, RVRangeError } from "./exception";
import { Bit, BitInput, BitVector, BitVector32, seal } from "./utils";

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7FFFFFFF;
const TWO_POW_32 = 0x100000000;

export interface EncodeResult {
    bits: BitVector32;
    hex: string;
    binary: string;
    overflow: Bit;
}

/**
 * Encode a signed integer into a 32-bit two's-complement pattern
 * @param value signed integer of any magnitude; a number must be an integer
 * @returns pattern wrapped modulo 2^32, renderings and overflow flag (1 if value is outside [-2^31, 2^31-1])
 * @throws RVRangeError if a number value is not an integer
 */
export function encode(value: number | bigint): EncodeResult {
    if (typeof value === "number" && !Number.isInteger(value))
        throw new RVRangeError(`Value ${value} is not an integer`, value);
    let big = BigInt(value);
    let overflow: Bit = big >= BigInt(INT32_MIN) && big <= BigInt(INT32_MAX) ? 0 : 1;
    let bits = fromUnsigned(Number(BigInt.asUintN(32, big)));
    return {
        bits: bits,
        hex: toHex(bits),
        binary: toGroupedBinary(bits),
        overflow: overflow,
    };
}

/**
 * Decode a 32-bit pattern to its signed value
 * @param input MSB-first binary string (`_` and whitespace allowed as separators)
 *              or an unsigned integer in [0, 2^32-1]
 * @returns value in [-2^31, 2^31-1]
 * @throws RVFormatError | RVRangeError
 */
export function decode(input: string | number | BitInput): number {
    let u: number;
    if (typeof input === "string") {
        u = fieldValue(parseBinaryString(input));
    } else if (typeof input === "number") {
        if (!Number.isInteger(input) || input < 0 || input > U32_MAX)
            throw new RVRangeError(`Integer input ${input} outside [0, ${U32_MAX}]`, input);
        u = input;
    } else {
        u = fieldValue(assertBitVector(input, 32));
    }
    return u <= INT32_MAX ? u : u - TWO_POW_32;
}

/**
 * Parse an MSB-first binary string into an LSB-first vector
 * @throws RVFormatError
 */
export function parseBinaryString(input: string): BitVector32 {
    let cleaned = input.replace(/[_\s]/g, "");
    if (!/^[01]{32}$/.test(cleaned))
        throw new RVFormatError(`Binary string must be 32 characters of '0'/'1', got "${input}"`);
    return seal(range(32).map((i): Bit => (cleaned[31 - i] === "1" ? 1 : 0)));
}

function checkWidths(bits: BitVector, fromWidth: number, toWidth: number): void {
    if (!Number.isInteger(fromWidth) || fromWidth < 1 || fromWidth > bits.length)
        throw new RVRangeError(`fromWidth ${fromWidth} outside [1, ${bits.length}]`, fromWidth);
    if (!Number.isInteger(toWidth) || toWidth < fromWidth)
        throw new RVRangeError(`toWidth ${toWidth} smaller than fromWidth ${fromWidth}`, toWidth);
}

/**
 * Widen the low `fromWidth` bits to `toWidth` by replicating bit `fromWidth - 1`
 * @param bits LSB-first vector of any length
 * @throws RVFormatError | RVRangeError
 */
export function signExtend(bits: BitInput, fromWidth: number, toWidth: number): BitVector {
    let src = assertBitVector(bits, undefined);
    checkWidths(src, fromWidth, toWidth);
    let sign = src[fromWidth - 1];
    return seal(range(toWidth).map((i): Bit => (i < fromWidth ? src[i] : sign)));
}

/**
 * Widen the low `fromWidth` bits to `toWidth` by inserting zeros
 * @param bits LSB-first vector of any length
 * @throws RVFormatError | RVRangeError
 */
export function zeroExtend(bits: BitInput, fromWidth: number, toWidth: number): BitVector {
    let src = assertBitVector(bits, undefined);
    checkWidths(src, fromWidth, toWidth);
    return seal(range(toWidth).map((i): Bit => (i < fromWidth ? src[i] : 0)));
}
