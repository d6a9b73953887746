/**
 * Numeric core: the arithmetic primitives behind one dispatch point
 */

import { RVExecDuplicatedUnitError, RVUnsupportedOpError } from "../exception";
import { BitInput, BitVector32 } from "../utils";
import { ArithOp, BaseExecUnit, RV32FExecUnit, RV32IExecUnit, RV32MExecUnit } from "./execution";

interface NumericCoreInterface {
    execUnits: BaseExecUnit[];

    /**
     * Execute an operation on two source operands
     * @param op Operation mnemonic
     * @param rs1 First source operand
     * @param rs2 Second source operand
     * @returns destination bits
     */
    execute(op: ArithOp, rs1: BitInput, rs2: BitInput): BitVector32;
}

export class NumericCore implements NumericCoreInterface {
    execUnits: BaseExecUnit[];

    constructor(execUnits?: BaseExecUnit[]) {
        this.execUnits = execUnits ?? [new RV32IExecUnit(), new RV32MExecUnit(), new RV32FExecUnit()];
    }

    /**
     * @throws RVUnsupportedOpError if no unit handles op
     * @throws RVExecDuplicatedUnitError if more than one unit handles op
     * @throws RVFormatError
     */
    execute(op: ArithOp, rs1: BitInput, rs2: BitInput): BitVector32 {
        let handled: BitVector32 | undefined = undefined;
        let handlers: BaseExecUnit[] = [];
        for (const execUnit of this.execUnits) {
            let result = execUnit.execute(op, rs1, rs2);
            if (result !== undefined) {
                handlers.push(execUnit);
                handled = result;
            }
        }
        if (handlers.length > 1)
            throw new RVExecDuplicatedUnitError(op, handlers);
        if (handled === undefined)
            throw new RVUnsupportedOpError(op, this.execUnits);
        return handled;
    }
}
