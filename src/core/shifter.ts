/**
 * Barrel shifter for SLL, SRL and SRA.
 *
 * The shift amount is decomposed into stages of 1, 2, 4, 8 and 16 positions
 * and each stage is applied when the matching amount bit is set, so no host
 * multi-bit shift operator touches the data.
 */

import { range } from "lodash";
import { assertBitVector32, fromUnsigned } from "../bits";
import { RVRangeError } from "../exception";
import { Bit, BitInput, BitVector, BitVector32, bitAt, seal } from "../utils";

export type ShiftDirection = "left" | "right";

const STAGES = [1, 2, 4, 8, 16];
export const MAX_SHIFT = 31;

function validateAmount(amount: number): number {
    if (!Number.isInteger(amount) || amount < 0 || amount > MAX_SHIFT)
        throw new RVRangeError(`Shift amount ${amount} outside [0, ${MAX_SHIFT}]`, amount);
    return amount;
}

/**
 * One fixed-distance stage, any width
 * @param src stage input, LSB first
 * @param k stage distance
 * @param direction shift direction
 * @param fill value for vacated positions
 */
function shiftStage(src: BitVector, k: number, direction: ShiftDirection, fill: Bit): Bit[] {
    return range(src.length).map((i): Bit => {
        let j = direction == "left" ? i - k : i + k;
        return j >= 0 && j < src.length ? src[j] : fill;
    });
}

/**
 * Cascade of power-of-two stages over a vector of any width
 * @param bits validated vector, LSB first
 * @param amount shift amount in [0, 31]
 * @param direction shift direction
 * @param fill value for vacated positions, constant across all stages
 * @throws RVRangeError
 */
export function barrelShift(bits: BitVector, amount: number, direction: ShiftDirection, fill: Bit = 0): BitVector {
    let control = fromUnsigned(validateAmount(amount));
    let out: BitVector = bits;
    STAGES.forEach((stage, idx) => {
        if (bitAt(control, idx) === 1)
            out = shiftStage(out, stage, direction, fill);
    });
    return seal([...out]);
}

/**
 * Shift left logical (zeros enter at the LSB end)
 * @param bits 32-bit vector, LSB first
 * @param amount shift amount in [0, 31]
 * @throws RVFormatError | RVRangeError
 */
export function shiftLeftLogical(bits: BitInput, amount: number): BitVector32 {
    let src = assertBitVector32(bits);
    return barrelShift(src, amount, "left", 0);
}

/**
 * Shift right logical (zeros enter at the MSB end)
 * @param bits 32-bit vector, LSB first
 * @param amount shift amount in [0, 31]
 * @throws RVFormatError | RVRangeError
 */
export function shiftRightLogical(bits: BitInput, amount: number): BitVector32 {
    let src = assertBitVector32(bits);
    return barrelShift(src, amount, "right", 0);
}

/**
 * Shift right arithmetic (the original sign bit enters at the MSB end)
 * @param bits 32-bit vector, LSB first
 * @param amount shift amount in [0, 31]
 * @throws RVFormatError | RVRangeError
 */
export function shiftRightArithmetic(bits: BitInput, amount: number): BitVector32 {
    let src = assertBitVector32(bits);
    return barrelShift(src, amount, "right", src[31]);
}
