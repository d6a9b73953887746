/**
 * Bit-vector utilities: conversion between unsigned 32-bit integers and
 * LSB-first bit vectors, plus human readable renderings.
 *
 * Host bit operators are only used here, for conversion and formatting.
 * The arithmetic units work on the vectors alone.
 */

import { chunk, every, range } from "lodash";
import { RVFormatError, RVRangeError } from "./exception";
import { Bit, BitInput, BitVector, BitVector32, hexify, isBit, seal } from "./utils";

export const WORD_WIDTH = 32;
export const U32_MAX = 0xFFFFFFFF;

/**
 * Validate a candidate 32-bit vector
 * @param bits candidate vector, LSB first
 * @param label operand name used in the error message
 * @returns the same elements typed as a BitVector32
 * @throws RVFormatError
 */
export function assertBitVector32(bits: BitInput, label: string = "bits"): BitVector32 {
    return assertBitVector(bits, WORD_WIDTH, label);
}

/**
 * Validate a bit vector of any (or an exact) width
 * @param bits candidate vector, LSB first
 * @param width required length, or undefined for any length
 * @param label operand name used in the error message
 * @throws RVFormatError
 */
export function assertBitVector(bits: BitInput, width: number | undefined, label: string = "bits"): BitVector {
    if (!Array.isArray(bits))
        throw new RVFormatError(`${label} must be an array of bits`);
    if (width !== undefined && bits.length != width)
        throw new RVFormatError(`${label} must contain exactly ${width} elements, got ${bits.length}`);
    let out: Bit[] = [];
    for (const b of bits) {
        if (!isBit(b))
            throw new RVFormatError(`${label} must contain only 0 or 1, got ${b}`);
        out.push(b);
    }
    return seal(out);
}

/**
 * Convert an unsigned 32-bit integer into a bit vector
 * @param value integer in [0, 2^32-1]
 * @returns vector with bit i = (value >> i) & 1
 * @throws RVRangeError
 */
export function fromUnsigned(value: number): BitVector32 {
    if (!Number.isInteger(value) || value < 0 || value > U32_MAX)
        throw new RVRangeError(`Value ${value} outside [0, ${hexify(U32_MAX)}]`, value);
    return seal(range(WORD_WIDTH).map((i): Bit => (((value >>> i) & 1) === 1 ? 1 : 0)));
}

/**
 * Convert a 32-bit vector back into an unsigned integer
 * @param bits vector, LSB first
 * @throws RVFormatError
 */
export function toUnsigned(bits: BitInput): number {
    return fieldValue(assertBitVector32(bits));
}

/**
 * Unsigned value of an already validated vector of at most 53 bits
 * @param bits field bits, LSB first
 */
export function fieldValue(bits: BitVector): number {
    let value = 0;
    let weight = 1;
    for (const b of bits) {
        if (b === 1)
            value += weight;
        weight *= 2;
    }
    return value;
}

/**
 * Render MSB first, grouped by byte, e.g. `00000000_00000000_00000000_00001101`
 * @param bits vector, LSB first
 * @param delimiter byte separator
 * @throws RVFormatError
 */
export function toGroupedBinary(bits: BitInput, delimiter: string = "_"): string {
    let msbFirst = assertBitVector32(bits).map((b) => (b === 1 ? "1" : "0")).reverse();
    return chunk(msbFirst, 8).map((group) => group.join("")).join(delimiter);
}

/**
 * Render as an 8-digit uppercase hex string, e.g. `0xDEADBEEF`
 * @param bits vector, LSB first
 * @throws RVFormatError
 */
export function toHex(bits: BitInput): string {
    return hexify(toUnsigned(bits));
}

/**
 * Bitwise complement of a validated vector, any width
 */
export function bitwiseNot(bits: BitVector): BitVector {
    return seal(bits.map((b): Bit => (b === 1 ? 0 : 1)));
}

/**
 * All-zero vector of the given width
 */
export function zeros(width: number): BitVector {
    return seal(range(width).map((): Bit => 0));
}

/**
 * Vector holding a single 1 at bit 0
 */
export function one(width: number): BitVector {
    return seal(range(width).map((i): Bit => (i === 0 ? 1 : 0)));
}

/**
 * Whether every bit of a vector is 0
 */
export function isZero(bits: BitVector): boolean {
    return every(bits, (b) => b === 0);
}
