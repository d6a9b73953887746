import { assertBitVector32, fieldValue, one, zeros } from "../bits";
import { andBit, Bit, BitInput, BitVector32, orBit, seal, xorBit } from "../utils";
import { add, sub } from "./alu";
import { fadd, fmul, fsub } from "./fpu";
import { divideRestoring, multiply } from "./mdu";
import { shiftLeftLogical, shiftRightArithmetic, shiftRightLogical } from "./shifter";

export type IntOp = "ADD" | "SUB" | "SLL" | "SRL" | "SRA" | "SLT" | "SLTU" | "AND" | "OR" | "XOR";
export type MulDivOp = "MUL" | "MULH" | "DIV" | "DIVU" | "REM" | "REMU";
export type FloatOp = "FADD.S" | "FSUB.S" | "FMUL.S";
export type ArithOp = IntOp | MulDivOp | FloatOp;

export abstract class BaseExecUnit {
    readonly description: string;

    constructor(_description: string) {
        this.description = _description;
    }

    /**
     * Try to execute an operation
     * @param op Operation mnemonic
     * @param rs1 First source operand
     * @param rs2 Second source operand
     * @returns destination bits, or undefined if the op is not handled by this unit
     * @throws RVFormatError
     */
    abstract execute(op: ArithOp, rs1: BitInput, rs2: BitInput): BitVector32 | undefined;

    toString(): string {
        return this.description;
    }
}

function condition(flag: Bit): BitVector32 {
    return flag === 1 ? one(32) : zeros(32);
}

function bitwise(rs1: BitInput, rs2: BitInput, gate: (a: Bit, b: Bit) => Bit): BitVector32 {
    let a = assertBitVector32(rs1, "rs1");
    let b = assertBitVector32(rs2, "rs2");
    return seal(a.map((bit, i) => gate(bit, b[i])));
}

export class RV32IExecUnit extends BaseExecUnit {
    static readonly OPS: readonly IntOp[] = ["ADD", "SUB", "SLL", "SRL", "SRA", "SLT", "SLTU", "AND", "OR", "XOR"];

    constructor() {
        super("RV32I");
    }

    /**
     * @returns result bits if op is an RV32I register-register op, undefined otherwise
     */
    execute(op: ArithOp, rs1: BitInput, rs2: BitInput): BitVector32 | undefined {
        switch (op) {
            case "ADD":
                return add(rs1, rs2).result;
            case "SUB":
                return sub(rs1, rs2).result;
            case "SLL":
                return shiftLeftLogical(rs1, shiftAmount(rs2));
            case "SRL":
                return shiftRightLogical(rs1, shiftAmount(rs2));
            case "SRA":
                return shiftRightArithmetic(rs1, shiftAmount(rs2));
            case "SLT": {
                // Signed less-than: N != V after rs1 - rs2
                let flags = sub(rs1, rs2);
                return condition(xorBit(flags.N, flags.V));
            }
            case "SLTU": {
                // Unsigned less-than: the subtraction borrowed
                let flags = sub(rs1, rs2);
                return condition(flags.C === 1 ? 0 : 1);
            }
            case "AND":
                return bitwise(rs1, rs2, andBit);
            case "OR":
                return bitwise(rs1, rs2, orBit);
            case "XOR":
                return bitwise(rs1, rs2, xorBit);
            default:
                return undefined;
        }
    }
}

// Register shifts only look at the low 5 bits of rs2
function shiftAmount(rs2: BitInput): number {
    return fieldValue(assertBitVector32(rs2, "rs2").slice(0, 5));
}

export class RV32MExecUnit extends BaseExecUnit {
    static readonly OPS: readonly MulDivOp[] = ["MUL", "MULH", "DIV", "DIVU", "REM", "REMU"];

    constructor() {
        super("RV32M");
    }

    execute(op: ArithOp, rs1: BitInput, rs2: BitInput): BitVector32 | undefined {
        switch (op) {
            case "MUL":
                return multiply(rs1, rs2).result;
            case "MULH":
                return multiply(rs1, rs2).high;
            case "DIV":
                return divideRestoring(rs1, rs2, true).quotient;
            case "DIVU":
                return divideRestoring(rs1, rs2, false).quotient;
            case "REM":
                return divideRestoring(rs1, rs2, true).remainder;
            case "REMU":
                return divideRestoring(rs1, rs2, false).remainder;
            default:
                return undefined;
        }
    }
}

export class RV32FExecUnit extends BaseExecUnit {
    static readonly OPS: readonly FloatOp[] = ["FADD.S", "FSUB.S", "FMUL.S"];

    constructor() {
        super("RV32F");
    }

    execute(op: ArithOp, rs1: BitInput, rs2: BitInput): BitVector32 | undefined {
        switch (op) {
            case "FADD.S":
                return fadd(rs1, rs2).result;
            case "FSUB.S":
                return fsub(rs1, rs2).result;
            case "FMUL.S":
                return fmul(rs1, rs2).result;
            default:
                return undefined;
        }
    }
}
