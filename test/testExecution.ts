import { fromUnsigned, toHex } from "../src/bits";
import { NumericCore } from "../src/core/core";
import { ArithOp, BaseExecUnit, RV32FExecUnit, RV32IExecUnit, RV32MExecUnit } from "../src/core/execution";
import { pack } from "../src/core/fpu";
import { RVExecDuplicatedUnitError, RVFormatError, RVUnsupportedOpError } from "../src/exception";
import { encode } from "../src/twos";
import { BitInput } from "../src/utils";
import { assert, expect } from "chai";
import fc from "fast-check";

/**
 * Test helper
 */

let U32Arb = fc.bigUintN(32).map((v) => Number(v));
let ALL_OPS: ArithOp[] = [...RV32IExecUnit.OPS, ...RV32MExecUnit.OPS, ...RV32FExecUnit.OPS];

function run(core: NumericCore, op: ArithOp, rs1: BitInput, rs2: BitInput): string {
    return toHex(core.execute(op, rs1, rs2));
}

/**
 * Test suites
 */

describe("ExecutionUnittest", function () {
    let core = new NumericCore();

    describe("RV32I", function () {
        it("ADD/SUB", function () {
            assert.equal(run(core, "ADD", fromUnsigned(5), fromUnsigned(7)), "0x0000000C");
            assert.equal(run(core, "SUB", fromUnsigned(5), fromUnsigned(7)), "0xFFFFFFFE");
        });

        it("shifts should only use the low 5 bits of rs2", function () {
            assert.equal(run(core, "SLL", fromUnsigned(1), fromUnsigned(0x21)), "0x00000002");
            assert.equal(run(core, "SRL", fromUnsigned(0x80000000), fromUnsigned(31)), "0x00000001");
            assert.equal(run(core, "SRA", fromUnsigned(0x80000000), fromUnsigned(0xFFFFFFE4)), "0xF8000000");
        });

        it("SLT should compare signed values", function () {
            assert.equal(run(core, "SLT", encode(-1).bits, encode(1).bits), "0x00000001");
            assert.equal(run(core, "SLT", encode(1).bits, encode(-1).bits), "0x00000000");
            // INT32_MIN - 1 overflows, N != V
            assert.equal(run(core, "SLT", fromUnsigned(0x80000000), encode(1).bits), "0x00000001");
        });

        it("SLTU should compare unsigned values", function () {
            assert.equal(run(core, "SLTU", fromUnsigned(0xFFFFFFFF), fromUnsigned(1)), "0x00000000");
            assert.equal(run(core, "SLTU", fromUnsigned(1), fromUnsigned(0xFFFFFFFF)), "0x00000001");
            assert.equal(run(core, "SLTU", fromUnsigned(3), fromUnsigned(3)), "0x00000000");
        });

        it("AND/OR/XOR", function () {
            let a = fromUnsigned(0xF0F0);
            let b = fromUnsigned(0xFF00);
            assert.equal(run(core, "AND", a, b), "0x0000F000");
            assert.equal(run(core, "OR", a, b), "0x0000FFF0");
            assert.equal(run(core, "XOR", a, b), "0x00000FF0");
        });
    });

    describe("RV32M", function () {
        it("MUL/MULH", function () {
            let a = encode(12345678).bits;
            let b = encode(-87654321).bits;
            assert.equal(run(core, "MUL", a, b), "0xD91D0712");
            assert.equal(run(core, "MULH", a, b), "0xFFFC27C9");
        });

        it("DIV/REM/DIVU/REMU", function () {
            assert.equal(run(core, "DIV", encode(-7).bits, encode(3).bits), "0xFFFFFFFE");
            assert.equal(run(core, "REM", encode(-7).bits, encode(3).bits), "0xFFFFFFFF");
            assert.equal(run(core, "DIVU", fromUnsigned(0x80000000), fromUnsigned(3)), "0x2AAAAAAA");
            assert.equal(run(core, "REMU", fromUnsigned(0x80000000), fromUnsigned(3)), "0x00000002");
        });

        it("divide by zero should not raise", function () {
            assert.equal(run(core, "DIVU", fromUnsigned(10), fromUnsigned(0)), "0xFFFFFFFF");
            assert.equal(run(core, "REM", fromUnsigned(10), fromUnsigned(0)), "0x0000000A");
        });
    });

    describe("RV32F", function () {
        it("FADD.S/FSUB.S/FMUL.S", function () {
            let a = pack(1.5).bits;
            let b = pack(2.25).bits;
            assert.equal(run(core, "FADD.S", a, b), "0x40700000");
            assert.equal(run(core, "FSUB.S", a, b), "0xBF400000");
            assert.equal(run(core, "FMUL.S", a, b), "0x40580000");
        });
    });

    describe("dispatch", function () {
        it("each unit should handle exactly its own ops", function () {
            let units: [BaseExecUnit, readonly ArithOp[]][] = [
                [new RV32IExecUnit(), RV32IExecUnit.OPS],
                [new RV32MExecUnit(), RV32MExecUnit.OPS],
                [new RV32FExecUnit(), RV32FExecUnit.OPS],
            ];
            let zero = fromUnsigned(0);
            for (const [unit, ops] of units) {
                for (const op of ALL_OPS) {
                    let handled = unit.execute(op, zero, zero) !== undefined;
                    assert.equal(handled, ops.includes(op), `${unit} on ${op}`);
                }
            }
        });

        it("should name units by their extension", function () {
            assert.equal(`${new RV32MExecUnit()}`, "RV32M");
            assert.equal(new RV32FExecUnit().description, "RV32F");
        });

        it("should raise error when two units handle the same op", function () {
            let dup = new NumericCore([new RV32IExecUnit(), new RV32IExecUnit()]);
            expect(() => dup.execute("ADD", fromUnsigned(1), fromUnsigned(2))).to.throw(RVExecDuplicatedUnitError);
        });

        it("should raise error when no unit handles the op", function () {
            let intOnly = new NumericCore([new RV32IExecUnit()]);
            expect(() => intOnly.execute("MUL", fromUnsigned(1), fromUnsigned(2)))
                .to.throw(RVUnsupportedOpError, "Op MUL not handled by any of [RV32I]");
        });

        it("should report the op and units on the error", function () {
            let intOnly = new NumericCore([new RV32IExecUnit()]);
            try {
                intOnly.execute("FADD.S", fromUnsigned(0), fromUnsigned(0));
                assert.fail("expected RVUnsupportedOpError");
            } catch (e) {
                assert.instanceOf(e, RVUnsupportedOpError);
                if (e instanceof RVUnsupportedOpError) {
                    assert.equal(e.op, "FADD.S");
                    assert.lengthOf(e.execUnits, 1);
                }
            }
        });

        it("should pass operand validation errors through", function () {
            expect(() => core.execute("ADD", [1, 0], fromUnsigned(0))).to.throw(RVFormatError);
        });
    });
});

describe("ExecutionPropertyTest", function () {
    let core = new NumericCore();

    it("ADD then SUB should restore rs1", function () {
        fc.assert(fc.property(U32Arb, U32Arb, (a, b) => {
            let sum = core.execute("ADD", fromUnsigned(a), fromUnsigned(b));
            return toHex(core.execute("SUB", sum, fromUnsigned(b))) === toHex(fromUnsigned(a));
        }));
    });

    it("XOR with itself should be zero", function () {
        fc.assert(fc.property(U32Arb, (a) => run(core, "XOR", fromUnsigned(a), fromUnsigned(a)) === "0x00000000"));
    });

    it("SLTU should match the host comparison", function () {
        fc.assert(fc.property(U32Arb, U32Arb, (a, b) => run(core, "SLTU", fromUnsigned(a), fromUnsigned(b)) === (a < b ? "0x00000001" : "0x00000000")));
    });

    it("SLT should match the host signed comparison", function () {
        fc.assert(fc.property(U32Arb, U32Arb, (a, b) => run(core, "SLT", fromUnsigned(a), fromUnsigned(b)) === ((a | 0) < (b | 0) ? "0x00000001" : "0x00000000")));
    });
});
