/**
 * Sample expectations report.
 *
 * Usage: npm run expectations
 */

import { padStart } from "lodash";
import { fromUnsigned, toGroupedBinary, toHex, zeros } from "./bits";
import { add, AluTrace, sub } from "./core/alu";
import { fadd, fmul, pack, unpack } from "./core/fpu";
import { divideRestoring, multiply, MulTraceRecord } from "./core/mdu";
import { encode } from "./twos";
import { Bit } from "./utils";

/**
 * Render the per-bit rows of an ALU ripple trace, with the partial
 * result accumulated so far
 * @param trace trace returned by add/sub
 * @returns one header line and one line per bit position
 */
export function formatAluTrace(trace: AluTrace): string[] {
    let lines = ["  step  ai bi cin -> s cout   partial_low32_hex"];
    let partial: Bit[] = [...zeros(32)];
    for (const record of trace) {
        if (record.phase != "iter")
            continue;
        partial[record.bit] = record.sum;
        lines.push(`  ${padStart(String(record.bit), 3)}   ${record.ai}  ${record.bi}  ${record.carryIn}`
            + `   -> ${record.sum}   ${record.carryOut}    ${toHex(partial)}`);
    }
    return lines;
}

/**
 * Render the per-step rows of a multiply trace
 * @param trace trace returned by multiply
 * @returns one header line and one line per multiplier bit
 */
export function formatMulTrace(trace: MulTraceRecord[]): string[] {
    let lines = ["  step  mul_bit  added  acc_hi32     acc_low32"];
    for (const record of trace) {
        lines.push(`  ${padStart(String(record.step), 4)}     ${record.multiplierBit}        ${record.added}`
            + `    ${record.accHighHex}  ${record.accLowHex}`);
    }
    return lines;
}

function twosLines(): string[] {
    let lines = ["Two's complement (width=32):"];
    for (const value of [13, -13]) {
        let enc = encode(value);
        let label = value > 0 ? `+${value}` : `${value}`;
        lines.push(`${label} -> bin ${enc.binary}; hex ${enc.hex}; overflow=${enc.overflow}`);
    }
    lines.push(`2^31 -> overflow=${encode(0x80000000).overflow}`);
    return lines;
}

function aluLines(): string[] {
    let lines = ["ALU edge cases:"];
    let cases: [string, number, number, typeof add][] = [
        ["0x7FFFFFFF + 0x00000001", 0x7FFFFFFF, 0x00000001, add],
        ["0x80000000 - 0x00000001", 0x80000000, 0x00000001, sub],
        ["-1 + -1", 0xFFFFFFFF, 0xFFFFFFFF, add],
    ];
    for (const [label, a, b, op] of cases) {
        let r = op(fromUnsigned(a), fromUnsigned(b));
        lines.push(`${label} -> ${toHex(r.result)}; N=${r.N} Z=${r.Z} C=${r.C} V=${r.V}`);
    }
    let traced = add(fromUnsigned(0x7FFFFFFF), fromUnsigned(0x00000001), true);
    lines.push("ADD trace (0x7FFFFFFF + 0x00000001):");
    lines.push(...formatAluTrace(traced.trace ?? []));
    let tracedSub = sub(fromUnsigned(0x80000000), fromUnsigned(0x00000001), true);
    lines.push("SUB trace (0x80000000 - 0x00000001):");
    lines.push(...formatAluTrace(tracedSub.trace ?? []));
    return lines;
}

function mduLines(): string[] {
    let product = multiply(encode(12345678).bits, encode(-87654321).bits, true);
    let signedDiv = divideRestoring(encode(-7).bits, encode(3).bits, true);
    let unsignedDiv = divideRestoring(fromUnsigned(0x80000000), fromUnsigned(3), false);
    return [
        "Multiply/divide:",
        `MUL 12345678 * -87654321 -> rd=${toHex(product.result)}; overflow=${product.overflow}`,
        `MULH 12345678 * -87654321 -> rd=${toHex(product.high)}`,
        `DIV -7 / 3 -> q=${toHex(signedDiv.quotient)}; r=${toHex(signedDiv.remainder)}`,
        `DIVU 0x80000000 / 3 -> q=${toHex(unsignedDiv.quotient)}; r=${toHex(unsignedDiv.remainder)}`,
        "MUL trace (12345678 * -87654321):",
        ...formatMulTrace(product.trace ?? []),
    ];
}

function floatLines(): string[] {
    let sum = fadd(pack(1.5).bits, pack(2.25).bits);
    let tenths = fadd(pack(0.1).bits, pack(0.2).bits);
    let huge = fmul(pack(1e38).bits, pack(10).bits);
    let tiny = fmul(pack(1e-38).bits, pack(1e-2).bits);
    return [
        "Float32:",
        `1.5 + 2.25 -> ${toHex(sum.result)}`,
        `0.1 + 0.2 -> ${unpack(tenths.result).value.toFixed(10)} ${toHex(tenths.result)}`,
        `1e38 * 10 -> ${toHex(huge.result)} (${huge.resultClass}); overflow=${huge.flags.overflow}`,
        `1e-38 * 1e-2 -> ${toGroupedBinary(tiny.result)} (${tiny.resultClass}); underflow=${tiny.flags.underflow}`,
    ];
}

/**
 * All report sections, separated by rule lines
 */
export function renderExpectations(): string[] {
    let rule = "-".repeat(40);
    return [twosLines(), aluLines(), mduLines(), floatLines()]
        .flatMap((section) => [rule, ...section]);
}

export function main(): void {
    for (const line of renderExpectations())
        console.log(line);
}

if (require.main === module) {
    main();
}
