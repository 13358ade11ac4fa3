/**
 * Error taxonomy for the sequence engine
 */

/**
 * Failure kinds raised by the engine.
 *
 * A search that runs out of range is not listed here: it is returned as data
 * (`found: false`) by the inversion functions.
 */
export type SequenceErrorKind =
    | "MalformedColor"
    | "UnknownMethod"
    | "InvalidParameter"
    | "NonConvergentRoot";

const KIND_CODES: Record<SequenceErrorKind, string> = {
    MalformedColor: "ERROR-MALFORMED-COLOR",
    UnknownMethod: "ERROR-UNKNOWN-METHOD",
    InvalidParameter: "ERROR-INVALID-PARAMETER",
    NonConvergentRoot: "ERROR-NONCONVERGENT-ROOT",
};

export class SequenceError extends Error {
    readonly kind: SequenceErrorKind;

    constructor(kind: SequenceErrorKind, detail: string) {
        super(`${KIND_CODES[kind]}: ${detail}`);
        this.name = "SequenceError";
        this.kind = kind;
    }
}

/**
 * Caller-correctable failures. NonConvergentRoot is an internal fault.
 */
export function isInputError(error: unknown): error is SequenceError {
    return error instanceof SequenceError && error.kind !== "NonConvergentRoot";
}
