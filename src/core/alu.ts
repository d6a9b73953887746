/**
 * Ripple-carry ALU for ADD/SUB with flags N, Z, C, V.
 *
 * Both operations run the same chain of 32 one-bit full adders:
 * ADD with carry-in 0, SUB as a + ~b with carry-in 1.
 *
 * - N: msb(result)
 * - Z: 1 if all result bits are 0
 * - C: carry out of the MSB (for SUB, C=1 means no borrow)
 * - V: carry into the MSB differs from carry out of the MSB
 */

import { assertBitVector32, bitwiseNot, isZero, toHex, zeros } from "../bits";
import { RVFormatError } from "../exception";
import { andBit, Bit, BitInput, BitVector, BitVector32, orBit, seal, xorBit } from "../utils";

export interface AluFlags {
    N: Bit;
    Z: Bit;
    C: Bit;
    V: Bit;
}

export interface AluStartRecord {
    phase: "start";
    aHex: string;
    bHex: string;
    carryIn: Bit;
}

export interface AluIterRecord {
    phase: "iter";
    bit: number;
    ai: Bit;
    bi: Bit;
    carryIn: Bit;
    sum: Bit;
    carryOut: Bit;
}

export interface AluFinishRecord extends AluFlags {
    phase: "finish";
    resultHex: string;
}

export type AluTraceRecord = AluStartRecord | AluIterRecord | AluFinishRecord;
export type AluTrace = AluTraceRecord[];

export interface AluResult extends AluFlags {
    result: BitVector32;
    trace?: AluTrace;
}

export interface RippleResult {
    sum: BitVector;
    // Carry into the top position
    carryIntoMsb: Bit;
    // Carry out of the top position
    carryOut: Bit;
}

/**
 * Ripple carry chain over two validated vectors of equal width
 * @param a addend
 * @param b addend
 * @param carryIn initial carry into bit 0
 * @param steps if given, one record per position is appended
 * @throws RVFormatError on width mismatch
 */
export function rippleCarryAdd(a: BitVector, b: BitVector, carryIn: Bit, steps?: AluIterRecord[]): RippleResult {
    if (a.length != b.length || a.length == 0)
        throw new RVFormatError(`Adder operands must share a non-zero width (${a.length} vs ${b.length})`);
    let out: Bit[] = [];
    let carry = carryIn;
    let carryIntoMsb: Bit = 0;
    for (let i = 0; i < a.length; i++) {
        let axb = xorBit(a[i], b[i]);
        let sum = xorBit(axb, carry);
        let cout = orBit(andBit(a[i], b[i]), andBit(carry, axb));
        out.push(sum);
        if (i == a.length - 1)
            carryIntoMsb = carry;
        steps?.push({ phase: "iter", bit: i, ai: a[i], bi: b[i], carryIn: carry, sum: sum, carryOut: cout });
        carry = cout;
    }
    return { sum: seal(out), carryIntoMsb: carryIntoMsb, carryOut: carry };
}

/**
 * Two's-complement negation (~x + 1), any width
 */
export function negate(bits: BitVector): BitVector {
    return rippleCarryAdd(bitwiseNot(bits), zeros(bits.length), 1).sum;
}

/**
 * The shared 32-bit adder with a selectable carry-in
 * @param a 32-bit vector, LSB first
 * @param b 32-bit vector, LSB first
 * @param carryIn initial carry
 * @param trace whether to record start, per-bit and finish steps
 * @throws RVFormatError
 */
export function addWithCarry(a: BitInput, b: BitInput, carryIn: Bit, trace: boolean = false): AluResult {
    let lhs = assertBitVector32(a, "a");
    let rhs = assertBitVector32(b, "b");
    return runChain(lhs, rhs, carryIn, trace);
}

function runChain(a: BitVector32, b: BitVector32, carryIn: Bit, trace: boolean): AluResult {
    let steps: AluTrace | undefined = trace ? [] : undefined;
    steps?.push({ phase: "start", aHex: toHex(a), bHex: toHex(b), carryIn: carryIn });
    let iters: AluIterRecord[] = [];
    let ripple = rippleCarryAdd(a, b, carryIn, trace ? iters : undefined);
    let flags: AluFlags = {
        N: ripple.sum[31],
        Z: isZero(ripple.sum) ? 1 : 0,
        C: ripple.carryOut,
        V: xorBit(ripple.carryIntoMsb, ripple.carryOut),
    };
    let result: AluResult = { result: ripple.sum, ...flags };
    if (steps) {
        steps.push(...iters);
        steps.push({ phase: "finish", resultHex: toHex(ripple.sum), ...flags });
        result.trace = steps;
    }
    return result;
}

/**
 * ADD: a + b
 * @param a 32-bit vector, LSB first
 * @param b 32-bit vector, LSB first
 * @param trace whether to return a ripple trace
 * @throws RVFormatError
 */
export function add(a: BitInput, b: BitInput, trace: boolean = false): AluResult {
    return addWithCarry(a, b, 0, trace);
}

/**
 * SUB: a - b computed as a + ~b + 1 in a single ripple
 * @param a minuend, 32-bit vector
 * @param b subtrahend, 32-bit vector
 * @param trace whether to return a ripple trace
 * @throws RVFormatError
 */
export function sub(a: BitInput, b: BitInput, trace: boolean = false): AluResult {
    let lhs = assertBitVector32(a, "a");
    let rhs = assertBitVector32(b, "b");
    return runChain(lhs, bitwiseNot(rhs), 1, trace);
}
