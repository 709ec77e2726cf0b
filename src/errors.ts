import {PairingsStep, TLVErrors} from "./types/hap";

// Raised when a byte sequence isn't structurally valid TLV8
export class TLVError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "TLVError";
    }
}

// Raised when a permission byte is outside of the defined set
export class UnknownPermissionError extends Error {
    readonly value: number;

    constructor(value: number) {
        super(`Unknown permission byte 0x${value.toString(16).padStart(2, "0")}`);
        this.name = "UnknownPermissionError";
        this.value = value;
    }
}

/**
 * Protocol level error of a /pairings exchange.
 * It terminates only the request it was raised in and is sent back to the controller as error container.
 */
export class PairingsError extends Error {
    readonly step: PairingsStep;
    readonly code: TLVErrors;

    constructor(step: PairingsStep, code: TLVErrors, message: string) {
        super(message);
        this.name = "PairingsError";
        this.step = step;
        this.code = code;
    }
}
