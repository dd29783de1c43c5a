/**
 * Exception classes for script parsing and execution
 */

/**
 * Base class for every error raised by the engine
 */
export class ScriptError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ScriptError';
    }
}

/**
 * A problem found while parsing, attributed to a 1-based source line
 */
export class ParseError extends ScriptError {
    lineNumber: number;
    constructor(message: string, lineNumber: number) {
        super(message);
        this.lineNumber = lineNumber;
        this.name = 'ParseError';
    }

    toString(): string {
        return `Line ${this.lineNumber}: ${this.message}`;
    }
}

export class UnknownCommandError extends ParseError {
    constructor(message: string, lineNumber: number) {
        super(message, lineNumber);
        this.name = 'UnknownCommandError';
    }
}

export class InvalidSyntaxError extends ParseError {
    constructor(message: string, lineNumber: number) {
        super(message, lineNumber);
        this.name = 'InvalidSyntaxError';
    }
}

/**
 * Raised by structural validation and, should a program reach the interpreter
 * unvalidated, by block matching
 */
export class UnmatchedControlStructureError extends ParseError {
    constructor(message: string, lineNumber: number) {
        super(message, lineNumber);
        this.name = 'UnmatchedControlStructureError';
    }
}

export class ProcedureDefinitionError extends ParseError {
    constructor(message: string, lineNumber: number) {
        super(message, lineNumber);
        this.name = 'ProcedureDefinitionError';
    }
}

/**
 * A failure while a script runs. `line` is the source line of the instruction, when known.
 */
export class ExecutionError extends ScriptError {
    line: number | null;
    constructor(message: string, line: number | null = null) {
        super(message);
        this.line = line;
        this.name = 'ExecutionError';
    }
}

export class InvalidExpressionError extends ExecutionError {
    expression: string;
    constructor(message: string, expression: string, line: number | null = null) {
        super(message, line);
        this.expression = expression;
        this.name = 'InvalidExpressionError';
    }
}

export class DivisionByZeroError extends InvalidExpressionError {
    constructor(expression: string, line: number | null = null) {
        super(`Division by zero in expression: ${expression}`, expression, line);
        this.name = 'DivisionByZeroError';
    }
}

/**
 * An effect reported failure, threw, or was never registered
 */
export class ExecutionFailedError extends ExecutionError {
    description: string;
    constructor(message: string, description: string, line: number | null = null) {
        super(message, line);
        this.description = description;
        this.name = 'ExecutionFailedError';
    }
}

export class TimeoutError extends ScriptError {
    timeoutMs: number;
    constructor(message: string, timeoutMs: number) {
        super(message);
        this.timeoutMs = timeoutMs;
        this.name = 'TimeoutError';
    }
}

/**
 * A pending operator prompt was abandoned because the run is stopping
 */
export class CancelledError extends ScriptError {
    constructor(message: string) {
        super(message);
        this.name = 'CancelledError';
    }
}
