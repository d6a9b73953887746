import { bitwiseNot, fromUnsigned, toHex, toUnsigned } from "../src/bits";
import { add, addWithCarry, AluIterRecord, sub } from "../src/core/alu";
import { RVFormatError } from "../src/exception";
import { assert, expect } from "chai";
import fc from "fast-check";

/**
 * Test helper
 */

let U32Arb = fc.bigUintN(32).map((v) => Number(v));
let OperandPairArb = fc.tuple(U32Arb, U32Arb);

function flagsOf(r: { N: number; Z: number; C: number; V: number }): number[] {
    return [r.N, r.Z, r.C, r.V];
}

/**
 * Test suites
 */

describe("AluUnittest", function () {
    describe("add", function () {
        it("0x7FFFFFFF + 0x00000001 should overflow into the sign bit", function () {
            let r = add(fromUnsigned(0x7FFFFFFF), fromUnsigned(0x00000001));
            assert.equal(toHex(r.result), "0x80000000");
            assert.deepEqual(flagsOf(r), [1, 0, 0, 1]);
        });

        it("-1 + -1 should carry out without overflow", function () {
            let r = add(fromUnsigned(0xFFFFFFFF), fromUnsigned(0xFFFFFFFF));
            assert.equal(toHex(r.result), "0xFFFFFFFE");
            assert.deepEqual(flagsOf(r), [1, 0, 1, 0]);
        });

        it("0 + 0 should set Z", function () {
            let r = add(fromUnsigned(0), fromUnsigned(0));
            assert.deepEqual(flagsOf(r), [0, 1, 0, 0]);
        });

        it("0x80000000 + 0x80000000 should wrap to zero with C and V", function () {
            let r = add(fromUnsigned(0x80000000), fromUnsigned(0x80000000));
            assert.equal(toHex(r.result), "0x00000000");
            assert.deepEqual(flagsOf(r), [0, 1, 1, 1]);
        });

        it("should not return a trace unless requested", function () {
            assert.isUndefined(add(fromUnsigned(1), fromUnsigned(2)).trace);
        });
    });

    describe("sub", function () {
        it("0x80000000 - 0x00000001 should overflow", function () {
            let r = sub(fromUnsigned(0x80000000), fromUnsigned(0x00000001));
            assert.equal(toHex(r.result), "0x7FFFFFFF");
            assert.deepEqual(flagsOf(r), [0, 0, 1, 1]);
        });

        it("5 - 5 should set Z and C (no borrow)", function () {
            let r = sub(fromUnsigned(5), fromUnsigned(5));
            assert.deepEqual(flagsOf(r), [0, 1, 1, 0]);
        });

        it("3 - 5 should borrow", function () {
            let r = sub(fromUnsigned(3), fromUnsigned(5));
            assert.equal(toHex(r.result), "0xFFFFFFFE");
            assert.deepEqual(flagsOf(r), [1, 0, 0, 0]);
        });
    });

    describe("trace", function () {
        it("should record start, 32 ripple steps and finish", function () {
            let r = add(fromUnsigned(0x7FFFFFFF), fromUnsigned(0x00000001), true);
            let trace = r.trace ?? [];
            assert.lengthOf(trace, 34);
            assert.deepEqual(trace[0], { phase: "start", aHex: "0x7FFFFFFF", bHex: "0x00000001", carryIn: 0 });
            assert.deepEqual(trace[1], { phase: "iter", bit: 0, ai: 1, bi: 1, carryIn: 0, sum: 0, carryOut: 1 });
            assert.deepEqual(trace[32], { phase: "iter", bit: 31, ai: 0, bi: 0, carryIn: 1, sum: 1, carryOut: 0 });
            assert.deepEqual(trace[33], { phase: "finish", resultHex: "0x80000000", N: 1, Z: 0, C: 0, V: 1 });
        });

        it("should record the complemented subtrahend and carry-in 1 for sub", function () {
            let r = sub(fromUnsigned(0x80000000), fromUnsigned(0x00000001), true);
            let trace = r.trace ?? [];
            assert.deepEqual(trace[0], { phase: "start", aHex: "0x80000000", bHex: "0xFFFFFFFE", carryIn: 1 });
        });

        it("should chain each carry-out into the next carry-in", function () {
            let trace = add(fromUnsigned(0x12345678), fromUnsigned(0x9ABCDEF0), true).trace ?? [];
            let iters = trace.filter((t): t is AluIterRecord => t.phase == "iter");
            for (let i = 1; i < iters.length; i++)
                assert.equal(iters[i].carryIn, iters[i - 1].carryOut);
        });
    });

    it("should reject malformed operands", function () {
        expect(() => add([0, 1], fromUnsigned(0))).to.throw(RVFormatError);
        expect(() => sub(fromUnsigned(0), new Array(32).fill(5))).to.throw(RVFormatError);
    });
});

describe("AluPropertyTest", function () {
    it("add should match modular host addition", function () {
        fc.assert(fc.property(OperandPairArb, ([a, b]) => toUnsigned(add(fromUnsigned(a), fromUnsigned(b)).result) === (a + b) % 0x100000000));
    });

    it("sub should match modular host subtraction", function () {
        fc.assert(fc.property(OperandPairArb, ([a, b]) => toUnsigned(sub(fromUnsigned(a), fromUnsigned(b)).result) === (a - b + 0x100000000) % 0x100000000));
    });

    it("Z should be set iff the result is zero and N should be bit 31", function () {
        fc.assert(fc.property(OperandPairArb, ([a, b]) => {
            let r = add(fromUnsigned(a), fromUnsigned(b));
            assert.equal(r.Z, toUnsigned(r.result) === 0 ? 1 : 0);
            assert.equal(r.N, r.result[31]);
        }));
    });

    it("V should be set iff same-sign operands give a different-sign sum", function () {
        fc.assert(fc.property(OperandPairArb, ([a, b]) => {
            let aBits = fromUnsigned(a);
            let bBits = fromUnsigned(b);
            let r = add(aBits, bBits);
            let expected = aBits[31] === bBits[31] && r.result[31] !== aBits[31] ? 1 : 0;
            assert.equal(r.V, expected);
        }));
    });

    it("C should be the unsigned carry out of add", function () {
        fc.assert(fc.property(OperandPairArb, ([a, b]) => add(fromUnsigned(a), fromUnsigned(b)).C === (a + b > 0xFFFFFFFF ? 1 : 0)));
    });

    it("sub should equal add of the complement with carry-in 1", function () {
        fc.assert(fc.property(OperandPairArb, ([a, b]) => {
            let aBits = fromUnsigned(a);
            let bBits = fromUnsigned(b);
            let r = sub(aBits, bBits);
            let viaAdd = addWithCarry(aBits, bitwiseNot(bBits), 1);
            assert.deepEqual(r.result, viaAdd.result);
            assert.deepEqual(flagsOf(r), flagsOf(viaAdd));
        }));
    });

    it("tracing should not change the result", function () {
        fc.assert(fc.property(OperandPairArb, ([a, b]) => {
            let plain = sub(fromUnsigned(a), fromUnsigned(b));
            let traced = sub(fromUnsigned(a), fromUnsigned(b), true);
            assert.deepEqual(traced.result, plain.result);
            assert.deepEqual(flagsOf(traced), flagsOf(plain));
        }));
    });
});
