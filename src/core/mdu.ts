/**
 * Multiply/Divide Unit for RV32M using bit-level algorithms.
 *
 * Multiply is a shift-add of the sign-extended multiplicand over a 64-bit
 * accumulator, one row per set multiplier bit. Divide is the
 * classic 32-iteration restoring algorithm over a 33-bit remainder and a
 * 32-bit quotient register.
 *
 * Division edge cases follow RISC-V M:
 * - x / 0 gives q = 0xFFFFFFFF and r = x (signed and unsigned)
 * - INT32_MIN / -1 gives q = INT32_MIN and r = 0
 */

import { assertBitVector32, bitwiseNot, isZero, toHex, zeros } from "../bits";
import { signExtend, zeroExtend } from "../twos";
import { Bit, BitInput, BitVector, BitVector32, Pair, seal, xorBit } from "../utils";
import { negate, rippleCarryAdd } from "./alu";
import { barrelShift } from "./shifter";

export interface MulTraceRecord {
    step: number;
    multiplierBit: Bit;
    // 1 when the partial product was accumulated
    added: Bit;
    accLowHex: string;
    accHighHex: string;
}

export interface MulResult {
    result: BitVector32;
    // Bits 32..63 of the signed product, what MULH returns
    high: BitVector32;
    // Accumulator bits 32..63 differ from bit 31 of result
    overflow: Bit;
    trace?: MulTraceRecord[];
}

export interface DivFlags {
    divByZero: Bit;
    overflow: Bit;
}

export interface DivStartRecord {
    phase: "start";
    dividendHex: string;
    divisorHex: string;
    signed: boolean;
}

export interface DivIterRecord {
    phase: "iter";
    step: number;
    quotientBit: Bit;
    restored: boolean;
    remainderHex: string;
    quotientHex: string;
}

export interface DivFinishRecord extends DivFlags {
    phase: "finish";
    quotientHex: string;
    remainderHex: string;
}

export type DivTraceRecord = DivStartRecord | DivIterRecord | DivFinishRecord;

export interface DivResult {
    quotient: BitVector32;
    remainder: BitVector32;
    flags: DivFlags;
    trace?: DivTraceRecord[];
}

/**
 * 32x32 shift-add multiply
 * @param rs1 multiplicand, 32-bit vector
 * @param rs2 multiplier, 32-bit vector
 * @param trace whether to return one record per multiplier bit
 * @returns low 32 bits, signed high 32 bits and the accumulator overflow flag
 * @throws RVFormatError
 */
export function multiply(rs1: BitInput, rs2: BitInput, trace: boolean = false): MulResult {
    let a = assertBitVector32(rs1, "rs1");
    let multiplicand = signExtend(a, 32, 64);
    let multiplier = assertBitVector32(rs2, "rs2");
    let acc = zeros(64);
    let steps: MulTraceRecord[] = [];
    for (let i = 0; i < 32; i++) {
        let bit = multiplier[i];
        if (bit === 1)
            acc = rippleCarryAdd(acc, barrelShift(multiplicand, i, "left"), 0).sum;
        if (trace) {
            steps.push({
                step: i,
                multiplierBit: bit,
                added: bit,
                accLowHex: toHex(acc.slice(0, 32)),
                accHighHex: toHex(acc.slice(32, 64)),
            });
        }
    }
    let low = seal(acc.slice(0, 32));
    let accHigh = seal(acc.slice(32, 64));
    let overflow: Bit = accHigh.some((b) => b !== low[31]) ? 1 : 0;
    // Every row was added, so rs2 counted as unsigned; take rs1 * 2^32 back out for the signed high word
    let high = multiplier[31] === 1 ? rippleCarryAdd(accHigh, bitwiseNot(a), 1).sum : accHigh;
    let result: MulResult = { result: low, high: high, overflow: overflow };
    if (trace)
        result.trace = steps;
    return result;
}

/**
 * Shift the (remainder, quotient) register pair left by one position,
 * the top quotient bit feeding the bottom of the remainder
 */
function shiftPairLeft(remainder: BitVector, quotient: BitVector): Pair<BitVector, BitVector> {
    let r = barrelShift(remainder, 1, "left");
    return [
        seal([quotient[31], ...r.slice(1)]),
        barrelShift(quotient, 1, "left"),
    ];
}

function withLowBit(bits: BitVector, bit: Bit): BitVector {
    return seal([bit, ...bits.slice(1)]);
}

function magnitude(bits: BitVector32, signed: boolean): BitVector32 {
    return signed && bits[31] === 1 ? negate(bits) : bits;
}

function isIntMin(bits: BitVector32): boolean {
    return bits[31] === 1 && isZero(bits.slice(0, 31));
}

function isMinusOne(bits: BitVector32): boolean {
    return bits.every((b) => b === 1);
}

/**
 * Restoring division
 * @param dividend 32-bit vector
 * @param divisor 32-bit vector
 * @param signed DIV/REM when true, DIVU/REMU when false
 * @param trace whether to return start, per-iteration and finish records
 * @throws RVFormatError
 */
export function divideRestoring(dividend: BitInput, divisor: BitInput, signed: boolean = true,
    trace: boolean = false): DivResult {
    let n = assertBitVector32(dividend, "dividend");
    let d = assertBitVector32(divisor, "divisor");
    let steps: DivTraceRecord[] = [];
    if (trace)
        steps.push({ phase: "start", dividendHex: toHex(n), divisorHex: toHex(d), signed: signed });

    let finish = (quotient: BitVector32, remainder: BitVector32, flags: DivFlags): DivResult => {
        let result: DivResult = { quotient: quotient, remainder: remainder, flags: flags };
        if (trace) {
            steps.push({ phase: "finish", quotientHex: toHex(quotient), remainderHex: toHex(remainder), ...flags });
            result.trace = steps;
        }
        return result;
    };

    if (isZero(d))
        return finish(bitwiseNot(zeros(32)), n, { divByZero: 1, overflow: 0 });
    if (signed && isIntMin(n) && isMinusOne(d))
        return finish(n, zeros(32), { divByZero: 0, overflow: 1 });

    let quotientSign = signed ? xorBit(n[31], d[31]) : 0;
    let q = magnitude(n, signed);
    let r = zeros(33);
    let divisor33 = zeroExtend(magnitude(d, signed), 32, 33);
    let notDivisor = bitwiseNot(divisor33);

    for (let step = 0; step < 32; step++) {
        [r, q] = shiftPairLeft(r, q);
        let tentative = rippleCarryAdd(r, notDivisor, 1);
        // No carry out means the subtraction borrowed: restore
        let restored = tentative.carryOut === 0;
        let quotientBit: Bit = restored ? 0 : 1;
        if (!restored)
            r = tentative.sum;
        q = withLowBit(q, quotientBit);
        if (trace) {
            steps.push({
                phase: "iter",
                step: step,
                quotientBit: quotientBit,
                restored: restored,
                remainderHex: toHex(r.slice(0, 32)),
                quotientHex: toHex(q),
            });
        }
    }

    let remainder = seal(r.slice(0, 32));
    if (quotientSign === 1)
        q = negate(q);
    if (signed && n[31] === 1 && !isZero(remainder))
        remainder = negate(remainder);
    return finish(q, remainder, { divByZero: 0, overflow: 0 });
}
