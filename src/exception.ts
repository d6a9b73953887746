import type { BaseExecUnit } from "./core/execution";

// Error due to the numeric core itself
export class RVNumericError extends Error {
    constructor(message: string) {
        super(message);
        this.name = `RVNumericError`;
    }
}

// Malformed bit-vector or binary string input
export class RVFormatError extends RVNumericError {
    constructor(message: string) {
        super(message);
        this.name = `RVFormatError`;
    }
}

// Scalar parameter outside its documented domain
export class RVRangeError extends RVNumericError {
    readonly value: number;
    constructor(message: string, value: number) {
        super(message);
        this.name = `RVRangeError`;
        this.value = value;
    }
}

export class RVExecError extends RVNumericError {
    readonly execUnits: BaseExecUnit[];
    readonly op: string;
    constructor(message: string, op: string, execUnits: BaseExecUnit[]) {
        super(message);
        this.name = `RVExecError`;
        this.execUnits = execUnits;
        this.op = op;
    }
}

export class RVExecDuplicatedUnitError extends RVExecError {
    constructor(op: string, execUnits: BaseExecUnit[]) {
        let msg = `Op ${op} handled by multiple execUnits in [${execUnits.join(", ")}]!`;
        super(msg, op, execUnits);
        this.name = `RVExecDuplicatedUnitError`;
    }
}

export class RVUnsupportedOpError extends RVExecError {
    constructor(op: string, execUnits: BaseExecUnit[]) {
        super(`Op ${op} not handled by any of [${execUnits.join(", ")}]`, op, execUnits);
        this.name = `RVUnsupportedOpError`;
    }
}
