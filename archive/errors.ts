/**
 * Weather Archive - Errors
 *
 * Thrown only for caller-contract violations. Misses and empty ranges are
 * ordinary results, never errors.
 */

export type ArchiveErrorCode =
    | 'UNRECOGNIZED_VARIABLE'
    | 'MALFORMED_DOCUMENT'
    | 'CLI_USAGE';

export class ArchiveError extends Error {
    readonly code: ArchiveErrorCode;

    constructor(code: ArchiveErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class UnrecognizedVariableError extends ArchiveError {
    readonly variable: string;

    constructor(variable: string) {
        super('UNRECOGNIZED_VARIABLE', `The variable "${variable}" is not recognized`);
        this.variable = variable;
    }
}

export class MalformedDocumentError extends ArchiveError {
    constructor(message: string) {
        super('MALFORMED_DOCUMENT', message);
    }
}

export class CliUsageError extends ArchiveError {
    constructor(message: string) {
        super('CLI_USAGE', message);
    }
}
