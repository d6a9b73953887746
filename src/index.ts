// Public API surface of the numeric core

export {
    assertBitVector32,
    bitwiseNot,
    fromUnsigned,
    toGroupedBinary,
    toHex,
    toUnsigned,
} from "./bits";
export { decode, encode, INT32_MAX, INT32_MIN, signExtend, zeroExtend, type EncodeResult } from "./twos";
export { MAX_SHIFT, shiftLeftLogical, shiftRightArithmetic, shiftRightLogical } from "./core/shifter";
export {
    add,
    addWithCarry,
    sub,
    type AluFlags,
    type AluResult,
    type AluTrace,
    type AluTraceRecord,
} from "./core/alu";
export {
    divideRestoring,
    multiply,
    type DivFlags,
    type DivResult,
    type DivTraceRecord,
    type MulResult,
    type MulTraceRecord,
} from "./core/mdu";
export {
    CANONICAL_NAN,
    classify,
    fadd,
    fmul,
    fsub,
    pack,
    unpack,
    type Float32Fields,
    type FloatClass,
    type FpuFlags,
    type FpuResult,
    type FpuTraceRecord,
    type PackResult,
    type UnpackResult,
} from "./core/fpu";
export {
    BaseExecUnit,
    RV32FExecUnit,
    RV32IExecUnit,
    RV32MExecUnit,
    type ArithOp,
} from "./core/execution";
export { NumericCore } from "./core/core";
export * from "./exception";
export type { Bit, BitInput, BitVector, BitVector32 } from "./utils";
