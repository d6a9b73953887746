/**
 * IEEE 754 binary32 pack/unpack and arithmetic (add/sub/mul).
 *
 * Operands are unpacked into a significand vector and a power-of-two scale,
 * combined exactly (align then add, or shift-add multiply), and rounded once
 * by the same guard/round/sticky RoundTiesToEven step that `pack` uses.
 *
 * Flags are classification heuristics, not IEEE exception state:
 * overflow, underflow and invalid.
 */

import { range } from "lodash";
import { assertBitVector32, bitwiseNot, fieldValue, fromUnsigned, isZero, one, toHex, zeros } from "../bits";
import { andBit, Bit, BitInput, BitVector, BitVector32, bitAt, seal } from "../utils";
import { rippleCarryAdd } from "./alu";
import { barrelShift } from "./shifter";

export type FloatClass = "zero" | "subnormal" | "normal" | "inf" | "nan";
export type FpuOp = "add" | "sub" | "mul";

export interface Float32Fields {
    sign: Bit;
    // 8 bits, LSB first
    exponent: BitVector;
    // 23 bits, LSB first
    fraction: BitVector;
}

export interface PackResult {
    bits: BitVector32;
    fields: Float32Fields;
}

export interface UnpackResult {
    value: number;
    class: FloatClass;
}

export interface FpuFlags {
    overflow: Bit;
    underflow: Bit;
    invalid: Bit;
}

export interface FpuTraceRecord {
    op: FpuOp;
    aHex: string;
    bHex: string;
    resultHex: string;
}

export interface FpuResult {
    result: BitVector32;
    resultClass: FloatClass;
    flags: FpuFlags;
    trace: FpuTraceRecord[];
}

export const EXP_BIAS = 127;
export const FRACTION_WIDTH = 23;
const EXP_MAX = 255;
// Scale of the least significant fraction bit of a subnormal
const MIN_SCALE = -149;
export const CANONICAL_NAN = 0x7FC00000;

// value = (-1)^sign * sig * 2^scale
interface Operand {
    sign: Bit;
    cls: FloatClass;
    sig: BitVector;
    scale: number;
}

/**
 * Split a pattern into its sign, exponent and fraction fields
 */
export function fieldsOf(bits: BitVector32): Float32Fields {
    return {
        sign: bits[31],
        exponent: seal(bits.slice(23, 31)),
        fraction: seal(bits.slice(0, 23)),
    };
}

/**
 * Classify a pattern from its exponent and fraction fields
 * @throws RVFormatError
 */
export function classify(bits: BitInput): FloatClass {
    let { exponent, fraction } = fieldsOf(assertBitVector32(bits));
    let e = fieldValue(exponent);
    if (e == EXP_MAX)
        return isZero(fraction) ? "inf" : "nan";
    if (e == 0)
        return isZero(fraction) ? "zero" : "subnormal";
    return "normal";
}

function assemble(sign: Bit, biasedExp: number, fraction: BitVector): BitVector32 {
    let exponent = fromUnsigned(biasedExp).slice(0, 8);
    return seal([...fraction, ...exponent, sign]);
}

function infinity(sign: Bit): BitVector32 {
    return assemble(sign, EXP_MAX, zeros(FRACTION_WIDTH));
}

function zero(sign: Bit): BitVector32 {
    return assemble(sign, 0, zeros(FRACTION_WIDTH));
}

function canonicalNaN(): BitVector32 {
    return fromUnsigned(CANONICAL_NAN);
}

/**
 * Round an exact value (-1)^sign * sig * 2^scale to binary32, ties to even.
 *
 * Normal results keep a 24-bit significand below the leading one; results
 * below 2^-126 keep the bits at scale 2^-149 and up. The bits just below the
 * kept ones are guard, round and sticky.
 */
function roundPack(sign: Bit, sig: BitVector, scale: number): BitVector32 {
    let top = sig.lastIndexOf(1);
    if (top < 0)
        return zero(sign);
    let leading = scale + top;
    let shift: number;
    let biased: number;
    if (leading >= 1 - EXP_BIAS) {
        shift = top - FRACTION_WIDTH;
        biased = leading + EXP_BIAS;
    } else {
        shift = MIN_SCALE - scale;
        biased = 0;
    }

    let kept: BitVector = seal(range(FRACTION_WIDTH + 1).map((i) => bitAt(sig, shift + i)));
    let guard = bitAt(sig, shift - 1);
    let round = bitAt(sig, shift - 2);
    let sticky: Bit = sig.slice(0, Math.max(0, shift - 2)).some((b) => b === 1) ? 1 : 0;

    if (guard === 1 && (round === 1 || sticky === 1 || kept[0] === 1)) {
        let inc = rippleCarryAdd(kept, one(FRACTION_WIDTH + 1), 0);
        kept = inc.sum;
        if (inc.carryOut === 1) {
            // Significand reached 2^24: renormalize
            kept = seal([...inc.sum.slice(1), 1]);
            biased += 1;
        }
    }
    // A subnormal that rounded up into bit 23 is the smallest normal
    if (biased == 0 && kept[FRACTION_WIDTH] === 1)
        biased = 1;
    if (biased >= EXP_MAX)
        return infinity(sign);
    return assemble(sign, biased, kept.slice(0, FRACTION_WIDTH));
}

/**
 * Pack a number into the nearest binary32 pattern (RoundTiesToEven)
 * @param value any number; NaN, ±Infinity and ±0 are handled directly
 * @returns pattern and its fields
 */
export function pack(value: number): PackResult {
    let bits: BitVector32;
    if (Number.isNaN(value)) {
        bits = canonicalNaN();
    } else if (value === Infinity || value === -Infinity) {
        bits = infinity(value < 0 ? 1 : 0);
    } else if (value === 0) {
        bits = zero(Object.is(value, -0) ? 1 : 0);
    } else {
        // Decompose the binary64 value into its 53-bit significand and scale
        let view = new DataView(new ArrayBuffer(8));
        view.setFloat64(0, value, true);
        let lo = fromUnsigned(view.getUint32(0, true));
        let hi = fromUnsigned(view.getUint32(4, true));
        let e11 = fieldValue(hi.slice(20, 31));
        let hidden: Bit = e11 === 0 ? 0 : 1;
        let sig = seal([...lo, ...hi.slice(0, 20), hidden]);
        let scale = (e11 === 0 ? 1 : e11) - 1075;
        bits = roundPack(hi[31], sig, scale);
    }
    return { bits: bits, fields: fieldsOf(bits) };
}

/**
 * Unpack a binary32 pattern to its value and class
 * @param bits 32-bit vector, LSB first
 * @throws RVFormatError
 */
export function unpack(bits: BitInput): UnpackResult {
    let operand = decodeOperand(assertBitVector32(bits));
    let value: number;
    switch (operand.cls) {
        case "nan":
            value = NaN;
            break;
        case "inf":
            value = Infinity;
            break;
        default:
            value = fieldValue(operand.sig) * Math.pow(2, operand.scale);
    }
    return { value: operand.sign === 1 ? -value : value, class: operand.cls };
}

function decodeOperand(bits: BitVector32): Operand {
    let { sign, exponent, fraction } = fieldsOf(bits);
    let cls = classify(bits);
    let e = fieldValue(exponent);
    let hidden: Bit = cls == "normal" ? 1 : 0;
    return {
        sign: sign,
        cls: cls,
        sig: seal([...fraction, hidden]),
        scale: e == 0 ? MIN_SCALE : e - EXP_BIAS - FRACTION_WIDTH,
    };
}

function isFiniteOperand(op: Operand): boolean {
    return op.cls != "inf" && op.cls != "nan";
}

function widen(sig: BitVector, lowZeros: number, width: number): BitVector {
    return seal(range(width).map((i) => bitAt(sig, i - lowZeros)));
}

function addOperands(x: Operand, y: Operand): BitVector32 {
    if (x.cls == "nan" || y.cls == "nan")
        return canonicalNaN();
    if (x.cls == "inf" && y.cls == "inf")
        return x.sign === y.sign ? infinity(x.sign) : canonicalNaN();
    if (x.cls == "inf")
        return infinity(x.sign);
    if (y.cls == "inf")
        return infinity(y.sign);
    if (x.cls == "zero" && y.cls == "zero")
        return zero(andBit(x.sign, y.sign));

    // Align both significands to the smaller scale, one spare bit for the carry
    let scale = Math.min(x.scale, y.scale);
    let width = Math.max(x.sig.length + x.scale, y.sig.length + y.scale) - scale + 1;
    let a = widen(x.sig, x.scale - scale, width);
    let b = widen(y.sig, y.scale - scale, width);

    if (x.sign === y.sign)
        return roundPack(x.sign, rippleCarryAdd(a, b, 0).sum, scale);

    let diff = rippleCarryAdd(a, bitwiseNot(b), 1);
    let sign = x.sign;
    let magnitude = diff.sum;
    if (diff.carryOut === 0) {
        // |y| > |x|
        magnitude = rippleCarryAdd(b, bitwiseNot(a), 1).sum;
        sign = y.sign;
    }
    // Exact cancellation rounds to +0
    return isZero(magnitude) ? zero(0) : roundPack(sign, magnitude, scale);
}

function significandProduct(a: BitVector, b: BitVector): BitVector {
    let width = a.length + b.length;
    let multiplicand = widen(a, 0, width);
    let acc = zeros(width);
    b.forEach((bit, i) => {
        if (bit === 1)
            acc = rippleCarryAdd(acc, barrelShift(multiplicand, i, "left"), 0).sum;
    });
    return acc;
}

function mulOperands(x: Operand, y: Operand): BitVector32 {
    let sign: Bit = x.sign === y.sign ? 0 : 1;
    if (x.cls == "nan" || y.cls == "nan")
        return canonicalNaN();
    if ((x.cls == "inf" && y.cls == "zero") || (x.cls == "zero" && y.cls == "inf"))
        return canonicalNaN();
    if (x.cls == "inf" || y.cls == "inf")
        return infinity(sign);
    if (x.cls == "zero" || y.cls == "zero")
        return zero(sign);
    return roundPack(sign, significandProduct(x.sig, y.sig), x.scale + y.scale);
}

function run(op: FpuOp, a: BitInput, b: BitInput): FpuResult {
    let aBits = assertBitVector32(a, "a");
    let bBits = assertBitVector32(b, "b");
    let x = decodeOperand(aBits);
    let y = decodeOperand(bBits);
    let result: BitVector32;
    switch (op) {
        case "add":
            result = addOperands(x, y);
            break;
        case "sub":
            result = addOperands(x, { ...y, sign: y.sign === 1 ? 0 : 1 });
            break;
        default:
            result = mulOperands(x, y);
            break;
    }
    let resultClass = classify(result);
    let finiteInputs = isFiniteOperand(x) && isFiniteOperand(y);
    let nonZeroInputs = finiteInputs && x.cls != "zero" && y.cls != "zero";
    let flags: FpuFlags = {
        overflow: finiteInputs && resultClass == "inf" ? 1 : 0,
        underflow: nonZeroInputs && (resultClass == "zero" || resultClass == "subnormal") ? 1 : 0,
        invalid: resultClass == "nan" && x.cls != "nan" && y.cls != "nan" ? 1 : 0,
    };
    return {
        result: result,
        resultClass: resultClass,
        flags: flags,
        trace: [{ op: op, aHex: toHex(aBits), bHex: toHex(bBits), resultHex: toHex(result) }],
    };
}

/**
 * Float32 addition
 * @param a operand A, 32 bits LSB first
 * @param b operand B, 32 bits LSB first
 * @throws RVFormatError
 */
export function fadd(a: BitInput, b: BitInput): FpuResult {
    return run("add", a, b);
}

/**
 * Float32 subtraction, addition with the sign of B inverted
 * @throws RVFormatError
 */
export function fsub(a: BitInput, b: BitInput): FpuResult {
    return run("sub", a, b);
}

/**
 * Float32 multiplication
 * @throws RVFormatError
 */
export function fmul(a: BitInput, b: BitInput): FpuResult {
    return run("mul", a, b);
}
